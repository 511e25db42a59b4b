/*
 *  grid.ts — Numeric scratch grids used while generating a floor
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { nbDirs } from "../globals/tables.js";

// =============================================================================
// Grid allocation
// =============================================================================

/** Grid type: column-major 2D array [x][y]. */
export type Grid = number[][];

/** Allocate a new grid of size width × height, initialized to 0. */
export function allocGrid(width: number, height: number): Grid {
    const grid: Grid = new Array(width);
    for (let i = 0; i < width; i++) {
        grid[i] = new Array<number>(height).fill(0);
    }
    return grid;
}

export function gridWidth(grid: Grid): number {
    return grid.length;
}

export function gridHeight(grid: Grid): number {
    return grid.length > 0 ? grid[0].length : 0;
}

export function coordinatesAreInGrid(grid: Grid, x: number, y: number): boolean {
    return x >= 0 && x < gridWidth(grid) && y >= 0 && y < gridHeight(grid);
}

// =============================================================================
// Basic grid operations
// =============================================================================

/** Copy all values from `from` grid into `to` grid. Both must share dimensions. */
export function copyGrid(to: Grid, from: Grid): void {
    for (let i = 0; i < gridWidth(from); i++) {
        for (let j = 0; j < gridHeight(from); j++) {
            to[i][j] = from[i][j];
        }
    }
}

// =============================================================================
// Cellular automata
// =============================================================================

const DIRECTION_COUNT = 8;

/**
 * One round of cellular automata on the grid.
 * birthParameters[n] and survivalParameters[n] are 't' (truthy) or not,
 * indexed by the number of live neighbors (0–8).
 */
export function cellularAutomataRound(
    grid: Grid,
    birthParameters: string,
    survivalParameters: string,
): void {
    const buffer = allocGrid(gridWidth(grid), gridHeight(grid));
    copyGrid(buffer, grid);

    for (let i = 0; i < gridWidth(grid); i++) {
        for (let j = 0; j < gridHeight(grid); j++) {
            let nbCount = 0;
            for (let dir = 0; dir < DIRECTION_COUNT; dir++) {
                const newX = i + nbDirs[dir][0];
                const newY = j + nbDirs[dir][1];
                if (coordinatesAreInGrid(buffer, newX, newY) && buffer[newX][newY]) {
                    nbCount++;
                }
            }
            if (!buffer[i][j] && birthParameters[nbCount] === "t") {
                grid[i][j] = 1; // birth
            } else if (buffer[i][j] && survivalParameters[nbCount] === "t") {
                // survival keeps the value
            } else {
                grid[i][j] = 0; // death
            }
        }
    }
}
