/**
 * 2D vector math for the police chase. Plain immutable records,
 * SI units by convention (m, m/s, N).
 */

export interface Vec2 {
    readonly x: number;
    readonly y: number;
}

export const ZERO: Vec2 = { x: 0, y: 0 };

export function vec2(x: number, y: number): Vec2 {
    return { x, y };
}

export function add(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, k: number): Vec2 {
    return { x: v.x * k, y: v.y * k };
}

export function negate(v: Vec2): Vec2 {
    return { x: -v.x, y: -v.y };
}

export function dot(a: Vec2, b: Vec2): number {
    return a.x * b.x + a.y * b.y;
}

export function length(v: Vec2): number {
    return Math.sqrt(v.x * v.x + v.y * v.y);
}

export function distance(a: Vec2, b: Vec2): number {
    return length(sub(a, b));
}

/** Unit vector in the direction of `v`; the zero vector stays zero */
export function normalize(v: Vec2): Vec2 {
    const len = length(v);
    return len === 0 ? ZERO : scale(v, 1 / len);
}
