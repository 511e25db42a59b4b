/*
 *  analysis.ts — Reachability of walkable tiles from the stairs
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { FloorGrid, Pos } from "../types/types.js";
import { TileFlag } from "../types/flags.js";
import { nbDirs } from "../globals/tables.js";
import { allocGrid, type Grid } from "../grid/grid.js";
import { coordinatesAreInFloor, findTiles, forEachTile, isWalkable } from "../grid/floor.js";

// =============================================================================
// Traversal
// =============================================================================

/**
 * Mark every walkable tile reachable from (startX, startY) over the four
 * cardinal directions. Returns a width × height grid of 0/1.
 */
export function reachableFrom(floor: FloorGrid, startX: number, startY: number): Grid {
    const visited = allocGrid(floor.width, floor.height);
    if (!coordinatesAreInFloor(floor, startX, startY) || !isWalkable(floor.tiles[startX][startY])) {
        return visited;
    }

    const queue: Pos[] = [{ x: startX, y: startY }];
    visited[startX][startY] = 1;
    for (let head = 0; head < queue.length; head++) {
        const { x, y } = queue[head];
        for (let dir = 0; dir < 4; dir++) {
            const newX = x + nbDirs[dir][0];
            const newY = y + nbDirs[dir][1];
            if (
                coordinatesAreInFloor(floor, newX, newY)
                && !visited[newX][newY]
                && isWalkable(floor.tiles[newX][newY])
            ) {
                visited[newX][newY] = 1;
                queue.push({ x: newX, y: newY });
            }
        }
    }
    return visited;
}

/**
 * Check that every walkable tile can reach the stairs. Walkable tiles that
 * cannot are flagged UNREACHABLE_FROM_STAIRS.
 *
 * With `markUnreachable` set the result is always true and the flags are
 * the only report, for diagnostics on floors known to be partial.
 */
export function stairsAlwaysReachable(floor: FloorGrid, stairs: Pos, markUnreachable = false): boolean {
    const visited = reachableFrom(floor, stairs.x, stairs.y);
    let allReached = true;
    forEachTile(floor, (tile, x, y) => {
        tile.flags &= ~TileFlag.UNREACHABLE_FROM_STAIRS;
        if (isWalkable(tile) && !visited[x][y]) {
            tile.flags |= TileFlag.UNREACHABLE_FROM_STAIRS;
            allReached = false;
        }
    });
    return markUnreachable || allReached;
}

// =============================================================================
// Diagnostics
// =============================================================================

export function countWalkableTiles(floor: FloorGrid): number {
    let count = 0;
    forEachTile(floor, (tile) => {
        if (isWalkable(tile)) {
            count++;
        }
    });
    return count;
}

/** Tiles flagged unreachable by the last stairs check, in row-major order. */
export function unreachableTiles(floor: FloorGrid): Pos[] {
    return findTiles(floor, (tile) => (tile.flags & TileFlag.UNREACHABLE_FROM_STAIRS) !== 0);
}
