/*
 *  hallways.ts — Hallway carving between grid cells
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { DungeonGrid, FloorGrid, GridCell, Pos } from "../types/types.js";
import { CellRole, Terrain } from "../types/enums.js";
import { ROOM_INDEX_HALLWAY } from "../types/constants.js";
import { TileFlag } from "../types/flags.js";
import { isOpen, tileAt } from "../grid/floor.js";
import { type RandomSource, randRange } from "../math/rng.js";
import { forEachCell } from "./helpers.js";

// =============================================================================
// Paths
// =============================================================================

function towards(from: number, to: number): number {
    return from < to ? 1 : -1;
}

/**
 * Tiles from `start` to `end`, both included. A horizontal hallway runs
 * along start.y to middle.x, turns onto middle.x until end.y, then runs
 * along end.y to end.x. A vertical hallway does the same with the axes
 * swapped and its turn on middle.y. Endpoints sharing the kink's axis give
 * a straight path.
 */
export function hallwayPath(start: Pos, end: Pos, vertical: boolean, middle: Pos): Pos[] {
    let x = start.x;
    let y = start.y;
    const path: Pos[] = [{ x, y }];

    if (!vertical) {
        while (x !== middle.x) {
            x += towards(x, middle.x);
            path.push({ x, y });
        }
        while (y !== end.y) {
            y += towards(y, end.y);
            path.push({ x, y });
        }
        while (x !== end.x) {
            x += towards(x, end.x);
            path.push({ x, y });
        }
    } else {
        while (y !== middle.y) {
            y += towards(y, middle.y);
            path.push({ x, y });
        }
        while (x !== end.x) {
            x += towards(x, end.x);
            path.push({ x, y });
        }
        while (y !== end.y) {
            y += towards(y, end.y);
            path.push({ x, y });
        }
    }
    return path;
}

// =============================================================================
// Carving
// =============================================================================

function canCarve(floor: FloorGrid, pos: Pos): boolean {
    const tile = tileAt(floor, pos.x, pos.y);
    return tile !== null && !isOpen(tile) && !(tile.flags & TileFlag.IMPASSABLE);
}

function carve(floor: FloorGrid, pos: Pos): void {
    const tile = tileAt(floor, pos.x, pos.y);
    if (tile) {
        tile.terrain = Terrain.Normal;
        tile.roomIndex = ROOM_INDEX_HALLWAY;
    }
}

/**
 * Carve a hallway along `hallwayPath`. Carving runs from the start until it
 * meets an open or impassable tile, then from the end backwards until it
 * meets one. Returns the number of tiles carved.
 */
export function createHallway(floor: FloorGrid, start: Pos, end: Pos, vertical: boolean, middle: Pos): number {
    const path = hallwayPath(start, end, vertical, middle);
    let carved = 0;

    let i = 0;
    while (i < path.length && canCarve(floor, path[i])) {
        carve(floor, path[i]);
        carved++;
        i++;
    }
    for (let j = path.length - 1; j > i && canCarve(floor, path[j]); j--) {
        carve(floor, path[j]);
        carved++;
    }
    return carved;
}

// =============================================================================
// Grid connections
// =============================================================================

function isCarvable(cell: GridCell): boolean {
    return !cell.invalid && cell.role !== CellRole.Unused;
}

function sameMergedRoom(a: GridCell, b: GridCell): boolean {
    return a.isMerged && b.isMerged && a.roomIndex === b.roomIndex;
}

/**
 * Carve one hallway per connected pair of adjacent cells. Endpoints sit on
 * random tiles just outside each room (or anchor) facing the other cell,
 * and the hallway turns on the boundary the two cells share.
 */
export function createGridCellConnections(rng: RandomSource, floor: FloorGrid, grid: DungeonGrid): void {
    forEachCell(grid, (cell, x, y) => {
        if (!isCarvable(cell)) {
            return;
        }
        const room = cell.room;

        if (cell.connectedRight && x + 1 < grid.cols) {
            const other = grid.cells[x + 1][y];
            if (isCarvable(other) && !sameMergedRoom(cell, other)) {
                const start = { x: room.endX, y: randRange(rng, room.startY, room.endY - 1) };
                const end = {
                    x: other.room.startX - 1,
                    y: randRange(rng, other.room.startY, other.room.endY - 1),
                };
                createHallway(floor, start, end, false, { x: cell.cell.endX, y: 0 });
            }
        }

        if (cell.connectedDown && y + 1 < grid.rows) {
            const other = grid.cells[x][y + 1];
            if (isCarvable(other) && !sameMergedRoom(cell, other)) {
                const start = { x: randRange(rng, room.startX, room.endX - 1), y: room.endY };
                const end = {
                    x: randRange(rng, other.room.startX, other.room.endX - 1),
                    y: other.room.startY - 1,
                };
                createHallway(floor, start, end, true, { x: 0, y: cell.cell.endY });
            }
        }
    });
}
