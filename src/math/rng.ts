/*
 *  rng.ts — Injectable random source and Bob Jenkins' small PRNG
 *  floor-architect
 *
 *  The PRNG uses 32-bit unsigned integer arithmetic with overflow semantics.
 *  We use `>>> 0` to ensure unsigned 32-bit behavior in JavaScript.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { WeightedEntry } from "../types/types.js";

/**
 * Source of uniform integers. Every random decision made during floor
 * generation goes through one of these.
 */
export interface RandomSource {
    /** Uniform integer in [0, n). Returns 0 when n <= 1. */
    nextInt(n: number): number;
}

// ===== Core PRNG (Jenkins small) =====

interface RanCtx {
    a: number;
    b: number;
    c: number;
    d: number;
}

function rot(x: number, k: number): number {
    return ((x << k) | (x >>> (32 - k))) >>> 0;
}

function ranval(ctx: RanCtx): number {
    const e = (ctx.a - rot(ctx.b, 27)) >>> 0;
    ctx.a = (ctx.b ^ rot(ctx.c, 17)) >>> 0;
    ctx.b = (ctx.c + ctx.d) >>> 0;
    ctx.c = (ctx.d + e) >>> 0;
    ctx.d = (e + ctx.a) >>> 0;
    return ctx.d;
}

function raninit(ctx: RanCtx, seed: bigint): void {
    const lo = Number(seed & 0xFFFFFFFFn) >>> 0;
    const hi = Number((seed >> 32n) & 0xFFFFFFFFn) >>> 0;

    ctx.a = 0xf1ea5eed;
    ctx.b = lo;
    ctx.c = (lo ^ hi) >>> 0;
    ctx.d = lo;

    for (let i = 0; i < 20; i++) {
        ranval(ctx);
    }
}

const RAND_MAX_COMBO = 0xFFFFFFFF;

/**
 * Seeded generator. Two instances built from the same seed produce the
 * same stream, which is what makes floors replayable.
 */
export class JenkinsRandom implements RandomSource {
    private readonly ctx: RanCtx = { a: 0, b: 0, c: 0, d: 0 };
    private generated = 0;

    constructor(seed: bigint | number) {
        raninit(this.ctx, BigInt.asUintN(64, BigInt(seed)));
    }

    /** Unbiased: rejection sampling removes modulo bias. */
    nextInt(n: number): number {
        if (n <= 1) {
            return 0;
        }
        this.generated++;
        const div = Math.floor(RAND_MAX_COMBO / n);
        let r: number;
        do {
            r = Math.floor(ranval(this.ctx) / div);
        } while (r >= n);
        return r;
    }

    /** Count of numbers drawn so far. */
    get randomNumbersGenerated(): number {
        return this.generated;
    }
}

// ===== Range helpers =====

/** Random integer in [0, n). */
export function randInt(rng: RandomSource, n: number): number {
    return rng.nextInt(n);
}

/**
 * Random integer in [lowerBound, upperBound], inclusive.
 * Returns lowerBound when the range is empty.
 */
export function randRange(rng: RandomSource, lowerBound: number, upperBound: number): number {
    if (upperBound <= lowerBound) {
        return lowerBound;
    }
    return lowerBound + rng.nextInt(upperBound - lowerBound + 1);
}

/** Test a random roll with a success chance of `percent` out of 100. */
export function randPercent(rng: RandomSource, percent: number): boolean {
    return rng.nextInt(100) < clamp(percent, 0, 100);
}

/** Pick an entry id by weight. Returns null for an empty or weightless table. */
export function pickWeighted(rng: RandomSource, table: readonly WeightedEntry[]): number | null {
    let total = 0;
    for (const entry of table) {
        total += entry.weight;
    }
    if (total <= 0) {
        return null;
    }
    let roll = rng.nextInt(total);
    for (const entry of table) {
        if (roll < entry.weight) {
            return entry.id;
        }
        roll -= entry.weight;
    }
    return null;
}

// ===== Utility functions =====

export function clamp(value: number, min: number, max: number): number {
    if (value < min) return min;
    if (value > max) return max;
    return value;
}

/**
 * Fisher-Yates (Knuth) shuffle, in-place.
 */
export function shuffleList<T>(rng: RandomSource, list: T[]): void {
    for (let i = 0; i < list.length - 1; i++) {
        const r = randRange(rng, i, list.length - 1);
        if (i !== r) {
            const tmp = list[r];
            list[r] = list[i];
            list[i] = tmp;
        }
    }
}
