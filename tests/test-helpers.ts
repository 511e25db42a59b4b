/*
 *  test-helpers.ts — Shared fixtures for the architect tests
 *  floor-architect
 */

import type { RandomSource } from "../src/math/rng.js";
import type { FloorProperties, FloorPropertiesInput } from "../src/types/types.js";
import { parseFloorProperties } from "../src/config/floor-properties.js";

/**
 * Random source that replays `values` in order, one per call with n > 1,
 * and returns 0 once the script runs out. Each value is taken modulo n.
 */
export class ScriptedRandom implements RandomSource {
    private index = 0;
    readonly requests: number[] = [];

    constructor(private readonly values: readonly number[]) {}

    nextInt(n: number): number {
        if (n <= 1) {
            return 0;
        }
        this.requests.push(n);
        const value = this.values[this.index] ?? 0;
        this.index++;
        return value % n;
    }

    /** Count of values drawn so far. */
    get consumed(): number {
        return this.index;
    }
}

export function scriptedRandom(values: readonly number[] = []): ScriptedRandom {
    return new ScriptedRandom(values);
}

export function props(input: FloorPropertiesInput = {}): FloorProperties {
    return parseFloorProperties(input);
}
