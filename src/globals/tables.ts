/*
 *  tables.ts — Direction tables
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { Direction } from "../types/enums.js";

/** Neighbor offsets: the four cardinals (indexed by Direction), then the diagonals. */
export const nbDirs: readonly (readonly [number, number])[] = Object.freeze([
    [0, -1], [0, 1], [-1, 0], [1, 0],
    [-1, -1], [-1, 1], [1, -1], [1, 1],
] as const);

export const CARDINAL_DIRECTIONS: readonly Direction[] = Object.freeze([
    Direction.Up, Direction.Down, Direction.Left, Direction.Right,
]);
