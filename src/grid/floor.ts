/*
 *  floor.ts — The tile grid: allocation, reset, tile predicates and
 *  whole-floor terrain passes
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { FloorGrid, Tile, Pos, Rect } from "../types/types.js";
import { Terrain } from "../types/enums.js";
import { ROOM_INDEX_HALLWAY } from "../types/constants.js";
import { TileFlag } from "../types/flags.js";

// =============================================================================
// Allocation & reset
// =============================================================================

/** A wall tile that belongs to no room. */
export function initializeTile(tile: Tile): void {
    tile.terrain = Terrain.Wall;
    tile.roomIndex = ROOM_INDEX_HALLWAY;
    tile.flags = 0;
    tile.spawnFlags = 0;
}

function makeTile(): Tile {
    return {
        terrain: Terrain.Wall,
        roomIndex: ROOM_INDEX_HALLWAY,
        flags: 0,
        spawnFlags: 0,
    };
}

/** Allocate a floor of the given size, already reset. */
export function allocFloor(width: number, height: number): FloorGrid {
    const tiles: Tile[][] = new Array(width);
    for (let i = 0; i < width; i++) {
        tiles[i] = new Array<Tile>(height);
        for (let j = 0; j < height; j++) {
            tiles[i][j] = makeTile();
        }
    }
    const floor: FloorGrid = { width, height, tiles };
    resetFloor(floor);
    return floor;
}

/**
 * Prepare a floor for a generation attempt: every tile becomes a plain wall,
 * the outer border is made impassable, and all spawn flags are cleared.
 */
export function resetFloor(floor: FloorGrid): void {
    for (let i = 0; i < floor.width; i++) {
        for (let j = 0; j < floor.height; j++) {
            initializeTile(floor.tiles[i][j]);
        }
    }
    for (let i = 0; i < floor.width; i++) {
        floor.tiles[i][0].flags |= TileFlag.IMPASSABLE;
        floor.tiles[i][floor.height - 1].flags |= TileFlag.IMPASSABLE;
    }
    for (let j = 0; j < floor.height; j++) {
        floor.tiles[0][j].flags |= TileFlag.IMPASSABLE;
        floor.tiles[floor.width - 1][j].flags |= TileFlag.IMPASSABLE;
    }
}

// =============================================================================
// Access
// =============================================================================

export function coordinatesAreInFloor(floor: FloorGrid, x: number, y: number): boolean {
    return x >= 0 && x < floor.width && y >= 0 && y < floor.height;
}

/** Tile at (x, y), or null outside the floor. */
export function tileAt(floor: FloorGrid, x: number, y: number): Tile | null {
    return coordinatesAreInFloor(floor, x, y) ? floor.tiles[x][y] : null;
}

/** Visit every tile in row-major order: top to bottom, left to right. */
export function forEachTile(floor: FloorGrid, fn: (tile: Tile, x: number, y: number) => void): void {
    for (let y = 0; y < floor.height; y++) {
        for (let x = 0; x < floor.width; x++) {
            fn(floor.tiles[x][y], x, y);
        }
    }
}

/** Positions matching the predicate, in row-major order. */
export function findTiles(floor: FloorGrid, predicate: (tile: Tile, x: number, y: number) => boolean): Pos[] {
    const found: Pos[] = [];
    forEachTile(floor, (tile, x, y) => {
        if (predicate(tile, x, y)) {
            found.push({ x, y });
        }
    });
    return found;
}

export function fillRect(floor: FloorGrid, rect: Rect, fn: (tile: Tile) => void): void {
    for (let x = Math.max(0, rect.startX); x < Math.min(floor.width, rect.endX); x++) {
        for (let y = Math.max(0, rect.startY); y < Math.min(floor.height, rect.endY); y++) {
            fn(floor.tiles[x][y]);
        }
    }
}

// =============================================================================
// Tile predicates
// =============================================================================

export function isOpen(tile: Tile): boolean {
    return tile.terrain === Terrain.Normal;
}

/** Walkable: open terrain that has not been made impassable. */
export function isWalkable(tile: Tile): boolean {
    return tile.terrain === Terrain.Normal && !(tile.flags & TileFlag.IMPASSABLE);
}

/** A wall that water or lava may replace. */
export function isPassableWall(tile: Tile): boolean {
    return tile.terrain === Terrain.Wall && !(tile.flags & TileFlag.IMPASSABLE);
}

export function isHallway(tile: Tile): boolean {
    return tile.terrain === Terrain.Normal && tile.roomIndex === ROOM_INDEX_HALLWAY;
}

export function isInRoom(tile: Tile): boolean {
    return tile.roomIndex !== ROOM_INDEX_HALLWAY;
}

// =============================================================================
// Terrain setters
// =============================================================================

/**
 * Turn a tile into an obstacle. Secondary terrain is only laid on tiles that
 * belong to `roomIndex`; anywhere else the obstacle becomes a wall.
 */
export function setTerrainObstacleChecked(tile: Tile, useSecondaryTerrain: boolean, roomIndex: number): void {
    if (useSecondaryTerrain && tile.roomIndex === roomIndex) {
        tile.terrain = Terrain.Secondary;
    } else {
        tile.terrain = Terrain.Wall;
    }
}

/** Lay secondary terrain on a passable wall. Returns whether the tile changed. */
export function setSecondaryTerrainOnWall(tile: Tile): boolean {
    if (!isPassableWall(tile)) {
        return false;
    }
    tile.terrain = Terrain.Secondary;
    return true;
}

// =============================================================================
// Whole-floor passes
// =============================================================================

export function ensureImpassableTilesAreWalls(floor: FloorGrid): void {
    forEachTile(floor, (tile) => {
        if (tile.flags & TileFlag.IMPASSABLE) {
            tile.terrain = Terrain.Wall;
        }
    });
}

export function convertSecondaryTerrainToChasms(floor: FloorGrid): void {
    forEachTile(floor, (tile) => {
        if (tile.terrain === Terrain.Secondary) {
            tile.terrain = Terrain.Chasm;
        }
    });
}

/** Every wall inside the impassable border becomes a chasm. */
export function convertWallsToChasms(floor: FloorGrid): void {
    forEachTile(floor, (tile) => {
        if (isPassableWall(tile)) {
            tile.terrain = Terrain.Chasm;
        }
    });
}

/**
 * Put rows 1 and height - 2 back to their reset state: plain walls, with
 * the tiles at either end impassable.
 */
export function resetInnerBoundaryTileRows(floor: FloorGrid): void {
    for (const y of [1, floor.height - 2]) {
        for (let x = 0; x < floor.width; x++) {
            initializeTile(floor.tiles[x][y]);
        }
        floor.tiles[0][y].flags |= TileFlag.IMPASSABLE;
        floor.tiles[floor.width - 1][y].flags |= TileFlag.IMPASSABLE;
    }
}

// =============================================================================
// Copy & compare
// =============================================================================

export function copyFloor(floor: FloorGrid): FloorGrid {
    const copy = allocFloor(floor.width, floor.height);
    forEachTile(floor, (tile, x, y) => {
        copy.tiles[x][y] = { ...tile };
    });
    return copy;
}

export function floorsEqual(a: FloorGrid, b: FloorGrid): boolean {
    if (a.width !== b.width || a.height !== b.height) {
        return false;
    }
    for (let x = 0; x < a.width; x++) {
        for (let y = 0; y < a.height; y++) {
            const ta = a.tiles[x][y];
            const tb = b.tiles[x][y];
            if (
                ta.terrain !== tb.terrain
                || ta.roomIndex !== tb.roomIndex
                || ta.flags !== tb.flags
                || ta.spawnFlags !== tb.spawnFlags
            ) {
                return false;
            }
        }
    }
    return true;
}
