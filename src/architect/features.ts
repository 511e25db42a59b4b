/*
 *  features.ts — Room features: mazes, secondary structures, imperfections,
 *  extra hallways, Kecleon shops and Monster Houses
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { DungeonGrid, FloorGrid, GridCell, Pos, Rect } from "../types/types.js";
import { CellRole, Direction, Terrain } from "../types/enums.js";
import {
    EXTRA_HALLWAY_MAX_LENGTH, KECLEON_SHOP_MIN_HEIGHT, KECLEON_SHOP_MIN_WIDTH,
    MAZE_MIN_HEIGHT, MAZE_MIN_WIDTH, ROOM_IMPERFECTION_CHANCE, ROOM_INDEX_HALLWAY,
    SECONDARY_STRUCTURE_CHANCE,
} from "../types/constants.js";
import { TileFlag } from "../types/flags.js";
import { CARDINAL_DIRECTIONS } from "../globals/tables.js";
import { fillRect, forEachTile, isOpen, setTerrainObstacleChecked, tileAt } from "../grid/floor.js";
import { type RandomSource, randInt, randPercent, randRange } from "../math/rng.js";
import {
    clockwise, dirDelta, forEachCell, insetRect, isNextToHallway, isPlainRoom,
    oppositeDirection, rectContains, rectHeight, rectWidth,
} from "./helpers.js";
import { flagHallwayJunctions } from "./junctions.js";

function pickCell(rng: RandomSource, grid: DungeonGrid, predicate: (cell: GridCell) => boolean): GridCell | null {
    const candidates: GridCell[] = [];
    forEachCell(grid, (cell) => {
        if (predicate(cell)) {
            candidates.push(cell);
        }
    });
    return candidates.length > 0 ? candidates[randInt(rng, candidates.length)] : null;
}

// =============================================================================
// Mazes
// =============================================================================

/**
 * Random walk with a stride of two inside `bounds`, laying an obstacle on the
 * tile stepped over and on the tile landed on. Ends when no step lands on an
 * open tile inside the bounds.
 */
export function generateMazeLine(
    rng: RandomSource,
    floor: FloorGrid,
    x0: number,
    y0: number,
    bounds: Rect,
    useSecondaryTerrain: boolean,
    roomIndex: number,
): void {
    let x = x0;
    let y = y0;
    for (;;) {
        const options: Direction[] = [];
        for (const dir of CARDINAL_DIRECTIONS) {
            const [dx, dy] = dirDelta(dir);
            const tile = rectContains(bounds, x + 2 * dx, y + 2 * dy) ? tileAt(floor, x + 2 * dx, y + 2 * dy) : null;
            if (tile && isOpen(tile)) {
                options.push(dir);
            }
        }
        if (options.length === 0) {
            return;
        }
        const [dx, dy] = dirDelta(options[randInt(rng, options.length)]);
        for (let step = 1; step <= 2; step++) {
            const tile = tileAt(floor, x + step * dx, y + step * dy);
            if (tile) {
                setTerrainObstacleChecked(tile, useSecondaryTerrain, roomIndex);
            }
        }
        x += 2 * dx;
        y += 2 * dy;
    }
}

/**
 * Fill an odd-sized room with a maze. Walls grow inwards from every other
 * tile of the surrounding wall, skipping openings, then from every remaining
 * open lattice point inside. Lines never step onto an obstacle, so the open
 * tiles stay connected.
 */
export function generateMaze(
    rng: RandomSource,
    floor: FloorGrid,
    room: Rect,
    useSecondaryTerrain: boolean,
    roomIndex: number,
): void {
    const edgeStarts: Pos[] = [];
    for (let x = room.startX + 1; x < room.endX; x += 2) {
        edgeStarts.push({ x, y: room.startY - 1 }, { x, y: room.endY });
    }
    for (let y = room.startY + 1; y < room.endY; y += 2) {
        edgeStarts.push({ x: room.startX - 1, y }, { x: room.endX, y });
    }
    for (const start of edgeStarts) {
        const tile = tileAt(floor, start.x, start.y);
        if (tile && !isOpen(tile)) {
            generateMazeLine(rng, floor, start.x, start.y, room, useSecondaryTerrain, roomIndex);
        }
    }

    for (let x = room.startX + 1; x < room.endX - 1; x += 2) {
        for (let y = room.startY + 1; y < room.endY - 1; y += 2) {
            const tile = tileAt(floor, x, y);
            if (tile && isOpen(tile)) {
                setTerrainObstacleChecked(tile, useSecondaryTerrain, roomIndex);
                generateMazeLine(rng, floor, x, y, room, useSecondaryTerrain, roomIndex);
            }
        }
    }
}

function fitsMaze(cell: GridCell): boolean {
    const w = rectWidth(cell.room);
    const h = rectHeight(cell.room);
    return isPlainRoom(cell) && w >= MAZE_MIN_WIDTH && h >= MAZE_MIN_HEIGHT && w % 2 === 1 && h % 2 === 1;
}

/** Roll for a maze room and build it in a random odd-sized plain room. */
export function generateMazeRoom(
    rng: RandomSource,
    floor: FloorGrid,
    grid: DungeonGrid,
    chance: number,
    useSecondaryTerrain: boolean,
): boolean {
    if (chance <= 0 || !randPercent(rng, chance)) {
        return false;
    }
    const cell = pickCell(rng, grid, fitsMaze);
    if (!cell) {
        return false;
    }
    cell.isMazeRoom = true;
    generateMaze(rng, floor, cell.room, useSecondaryTerrain, cell.roomIndex);
    return true;
}

// =============================================================================
// Secondary structures
// =============================================================================

/**
 * Give some plain rooms a central pool of room-owned secondary terrain or a
 * lattice of pillars. Both keep a walkable ring two tiles wide along the
 * room edge. Returns the number of rooms changed.
 */
export function generateSecondaryStructures(rng: RandomSource, floor: FloorGrid, grid: DungeonGrid): number {
    let built = 0;
    forEachCell(grid, (cell) => {
        if (!isPlainRoom(cell) || rectWidth(cell.room) < 5 || rectHeight(cell.room) < 5) {
            return;
        }
        if (!randPercent(rng, SECONDARY_STRUCTURE_CHANCE)) {
            return;
        }
        const inner = insetRect(cell.room, 2);
        if (randInt(rng, 2) === 0) {
            fillRect(floor, inner, (tile) => setTerrainObstacleChecked(tile, true, cell.roomIndex));
        } else {
            for (let x = inner.startX; x < inner.endX; x += 2) {
                for (let y = inner.startY; y < inner.endY; y += 2) {
                    const tile = tileAt(floor, x, y);
                    if (tile) {
                        setTerrainObstacleChecked(tile, false, cell.roomIndex);
                        tile.roomIndex = ROOM_INDEX_HALLWAY;
                    }
                }
            }
        }
        cell.hasSecondaryStructure = true;
        built++;
    });
    return built;
}

// =============================================================================
// Room imperfections
// =============================================================================

/**
 * Grow wall nubs from the corners of some plain rooms along their edges.
 * Tiles next to a hallway are left open.
 */
export function generateRoomImperfections(rng: RandomSource, floor: FloorGrid, grid: DungeonGrid): number {
    let changed = 0;
    forEachCell(grid, (cell) => {
        if (!isPlainRoom(cell) || cell.hasSecondaryStructure) {
            return;
        }
        if (!randPercent(rng, ROOM_IMPERFECTION_CHANCE)) {
            return;
        }
        const room = cell.room;
        const maxLength = Math.max(1, Math.floor(Math.min(rectWidth(room), rectHeight(room)) / 2) - 1);
        const corners: [number, number, number, number][] = [
            [room.startX, room.startY, 1, 1],
            [room.endX - 1, room.startY, -1, 1],
            [room.startX, room.endY - 1, 1, -1],
            [room.endX - 1, room.endY - 1, -1, -1],
        ];
        for (const [cx, cy, sx, sy] of corners) {
            const length = randRange(rng, 0, maxLength);
            for (let i = 0; i < length; i++) {
                for (const [x, y] of [[cx + sx * i, cy], [cx, cy + sy * i]]) {
                    const tile = tileAt(floor, x, y);
                    if (tile && isOpen(tile) && !isNextToHallway(floor, x, y)) {
                        tile.terrain = Terrain.Wall;
                        tile.roomIndex = ROOM_INDEX_HALLWAY;
                    }
                }
            }
        }
        cell.isImperfect = true;
        changed++;
    });
    return changed;
}

// =============================================================================
// Extra hallways
// =============================================================================

function edgeStart(rng: RandomSource, room: Rect, dir: Direction): Pos {
    switch (dir) {
        case Direction.Up:    return { x: randRange(rng, room.startX, room.endX - 1), y: room.startY - 1 };
        case Direction.Down:  return { x: randRange(rng, room.startX, room.endX - 1), y: room.endY };
        case Direction.Left:  return { x: room.startX - 1, y: randRange(rng, room.startY, room.endY - 1) };
        default:              return { x: room.endX, y: randRange(rng, room.startY, room.endY - 1) };
    }
}

/**
 * Walk one hallway out of a room edge, turning now and then. Returns the
 * tiles to carve when the walk meets an open tile, or null when it runs into
 * an impassable tile, leaves the floor, or gives up.
 */
export function extraHallwayPath(rng: RandomSource, floor: FloorGrid, room: Rect, dir: Direction): Pos[] | null {
    let pos = edgeStart(rng, room, dir);
    let heading = dir;
    const path: Pos[] = [];

    for (let step = 0; step < EXTRA_HALLWAY_MAX_LENGTH; step++) {
        const tile = tileAt(floor, pos.x, pos.y);
        if (!tile || tile.flags & TileFlag.IMPASSABLE) {
            return null;
        }
        if (isOpen(tile)) {
            return path.length > 0 ? path : null;
        }
        path.push(pos);

        if (randInt(rng, 4) === 0) {
            heading = randInt(rng, 2) === 0 ? clockwise(heading) : oppositeDirection(clockwise(heading));
        }
        const [dx, dy] = dirDelta(heading);
        pos = { x: pos.x + dx, y: pos.y + dy };
    }
    return null;
}

/** Add `density` attempts at extra hallways out of random rooms. */
export function generateExtraHallways(rng: RandomSource, floor: FloorGrid, grid: DungeonGrid, density: number): number {
    let carved = 0;
    for (let i = 0; i < density; i++) {
        const cell = pickCell(rng, grid, (c) => c.role === CellRole.Room && !c.invalid && !c.isMazeRoom);
        if (!cell) {
            return carved;
        }
        const path = extraHallwayPath(rng, floor, cell.room, CARDINAL_DIRECTIONS[randInt(rng, 4)]);
        if (!path) {
            continue;
        }
        let minX = floor.width;
        let minY = floor.height;
        let maxX = 0;
        let maxY = 0;
        for (const pos of path) {
            const tile = tileAt(floor, pos.x, pos.y);
            if (tile) {
                tile.terrain = Terrain.Normal;
                tile.roomIndex = ROOM_INDEX_HALLWAY;
            }
            minX = Math.min(minX, pos.x);
            minY = Math.min(minY, pos.y);
            maxX = Math.max(maxX, pos.x);
            maxY = Math.max(maxY, pos.y);
        }
        flagHallwayJunctions(floor, minX - 1, minY - 1, maxX + 2, maxY + 2);
        carved++;
    }
    return carved;
}

// =============================================================================
// Kecleon shops & Monster Houses
// =============================================================================

function fitsShop(cell: GridCell): boolean {
    return isPlainRoom(cell)
        && rectWidth(cell.room) >= KECLEON_SHOP_MIN_WIDTH
        && rectHeight(cell.room) >= KECLEON_SHOP_MIN_HEIGHT;
}

/** Flag the open tiles of a room, inset by one, as a Kecleon shop. */
export function flagKecleonShop(floor: FloorGrid, room: Rect): void {
    fillRect(floor, insetRect(room, 1), (tile) => {
        if (isOpen(tile)) {
            tile.flags |= TileFlag.IN_KECLEON_SHOP;
        }
    });
}

/** Flag every tile of a room as Monster House. */
export function flagMonsterHouse(floor: FloorGrid, roomIndex: number): void {
    forEachTile(floor, (tile) => {
        if (tile.roomIndex === roomIndex) {
            tile.flags |= TileFlag.IN_MONSTER_HOUSE;
        }
    });
}

export function generateKecleonShop(rng: RandomSource, floor: FloorGrid, grid: DungeonGrid, chance: number): boolean {
    if (chance <= 0 || !randPercent(rng, chance)) {
        return false;
    }
    const cell = pickCell(rng, grid, fitsShop);
    if (!cell) {
        return false;
    }
    cell.isKecleonShop = true;
    flagKecleonShop(floor, cell.room);
    return true;
}

export function generateMonsterHouse(rng: RandomSource, floor: FloorGrid, grid: DungeonGrid, chance: number): boolean {
    if (chance <= 0 || !randPercent(rng, chance)) {
        return false;
    }
    const cell = pickCell(rng, grid, isPlainRoom);
    if (!cell) {
        return false;
    }
    cell.isMonsterHouse = true;
    flagMonsterHouse(floor, cell.roomIndex);
    return true;
}
