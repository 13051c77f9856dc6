import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { LogHandler } from '@/utilities/log-handler';
import { LogManager, LogType, cleanStackTrace, type ILogMessage } from '@/utilities/log-manager';
import { ThrottledLogger } from '@/utilities/throttled-logger';

// ─── LogManager ───────────────────────────────────────────────────────────────

describe('LogManager', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('numbers messages and replays history to a new listener', () => {
        const manager = new LogManager();
        manager.setConsoleOutput(false);
        manager.push({ type: LogType.Info, source: 'A', msg: 'one' });
        manager.push({ type: LogType.Info, source: 'A', msg: 'two' });

        const received: ILogMessage[] = [];
        manager.onLogMessage(msg => received.push(msg));

        expect(received.map(msg => [msg.index, msg.msg])).toEqual([[0, 'one'], [1, 'two']]);
    });

    it('keeps only the latest 100 messages', () => {
        const manager = new LogManager();
        manager.setConsoleOutput(false);
        for (let i = 0; i < 105; i++) {
            manager.push({ type: LogType.Debug, source: 'A', msg: `m${i}` });
        }

        expect(manager.log).toHaveLength(100);
        expect(manager.log[0].msg).toBe('m5');
    });

    it('drops messages below the minimum level', () => {
        const manager = new LogManager();
        manager.setConsoleOutput(false);
        manager.setMinLevel(LogType.Warn);

        manager.push({ type: LogType.Info, source: 'A', msg: 'chatty' });
        manager.push({ type: LogType.Error, source: 'A', msg: 'bad' });

        expect(manager.log.map(msg => msg.msg)).toEqual(['bad']);
    });

    it('writes to the console by level with the source in front', () => {
        const manager = new LogManager();
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        manager.push({ type: LogType.Warn, source: 'Settings', msg: 'odd value' });

        expect(warn).toHaveBeenCalledWith('Settings\todd value');
    });

    it('appends the exception message to errors', () => {
        const manager = new LogManager();
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const exception = new Error('disk full');
        exception.stack = 'Error: disk full\n    at save (file.ts:1:1)';

        manager.push({ type: LogType.Error, source: 'Store', msg: 'save failed', exception });

        expect(error).toHaveBeenCalledWith(
            'Store\tsave failed\ndisk full\nError: disk full\n    at save (file.ts:1:1)',
        );
    });

    it('suppresses identical console messages within the throttle window', () => {
        const manager = new LogManager();
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        vi.spyOn(performance, 'now').mockReturnValue(1000);

        manager.push({ type: LogType.Info, source: 'Loop', msg: 'tick' });
        manager.push({ type: LogType.Info, source: 'Loop', msg: 'tick' });
        manager.push({ type: LogType.Info, source: 'Loop', msg: 'tock' });

        expect(info.mock.calls).toEqual([['Loop\ttick'], ['Loop\ttock']]);
        expect(manager.log).toHaveLength(3);
    });

    it('reports how many messages were suppressed', () => {
        const manager = new LogManager();
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const now = vi.spyOn(performance, 'now').mockReturnValue(1000);

        manager.push({ type: LogType.Info, source: 'Loop', msg: 'tick' });
        manager.push({ type: LogType.Info, source: 'Loop', msg: 'tick' });
        manager.push({ type: LogType.Info, source: 'Loop', msg: 'tick' });
        now.mockReturnValue(3000);
        manager.push({ type: LogType.Info, source: 'Loop', msg: 'tick' });

        expect(info.mock.calls).toEqual([['Loop\ttick'], ['Loop\ttick (2 similar suppressed)']]);
    });
});

describe('cleanStackTrace', () => {
    it('cuts the stack at the first timer frame', () => {
        const stack = [
            'Error: boom',
            '    at tick (game-loop.ts:10:5)',
            '    at listOnTimeout (node:internal/timers:573:17)',
            '    at process.processTimers (node:internal/timers:514:7)',
        ].join('\n');

        expect(cleanStackTrace(stack)).toBe([
            'Error: boom',
            '    at tick (game-loop.ts:10:5)',
            '    at listOnTimeout (node:internal/timers:573:17)',
            '    ... (async stack truncated)',
        ].join('\n'));
    });

    it('leaves stacks without timer frames alone', () => {
        const stack = 'Error: boom\n    at main (cli.ts:3:1)';

        expect(cleanStackTrace(stack)).toBe(stack);
    });
});

// ─── ThrottledLogger ──────────────────────────────────────────────────────────

describe('ThrottledLogger', () => {
    let messages: string[];

    beforeEach(() => {
        messages = [];
        const manager = LogHandler.getLogManager();
        manager.reset();
        manager.setConsoleOutput(false);
        manager.onLogMessage(msg => {
            if (typeof msg.msg === 'string') messages.push(msg.msg);
        });
    });

    afterEach(() => {
        LogHandler.getLogManager().onLogMessage(null);
    });

    it('logs at most once per window and counts the rest', () => {
        let nowMs = 0;
        const logger = new ThrottledLogger(new LogHandler('Test'), 1000, () => nowMs);
        const error = new Error('again');

        expect(logger.error('step failed', error)).toBe(true);
        nowMs = 500;
        expect(logger.error('step failed', error)).toBe(false);
        expect(logger.warn('step failed')).toBe(false);
        nowMs = 1500;
        expect(logger.warn('step failed')).toBe(true);

        expect(messages).toEqual(['step failed', 'step failed (2 similar suppressed)']);
    });
});
