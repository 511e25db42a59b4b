/*
 *  grid-layout.ts — Grid layout planning: cell partitioning, room and
 *  anchor creation, and cell connectivity
 *  floor-architect
 *
 *  The floor is cut into a cols × rows grid of cells. Each valid cell holds
 *  either a room (a filled rectangle with its own room index) or a hallway
 *  anchor (one open tile that hallways pass through). Connections between
 *  adjacent cells are decided here and carved later by the hallway carver.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { DungeonGrid, FloorGrid, GridCell, Pos, Rect } from "../types/types.js";
import { CellRole, Direction, Terrain } from "../types/enums.js";
import {
    MAX_ROOM_INDEX, MIN_ROOM_COUNT, MIN_ROOM_HEIGHT, MIN_ROOM_WIDTH,
    ROOM_INDEX_ANCHOR, ROOM_INDEX_HALLWAY,
} from "../types/constants.js";
import { CARDINAL_DIRECTIONS } from "../globals/tables.js";
import { fillRect, tileAt } from "../grid/floor.js";
import { type RandomSource, clamp, randInt, randRange, shuffleList } from "../math/rng.js";
import {
    connectCells, connectionCount, disconnectCells, forEachCell, isConnected,
    neighborCell, rectHeight, rectWidth,
} from "./helpers.js";

// =============================================================================
// Grid construction
// =============================================================================

/**
 * Boundary coordinates for `count` equal cells along an axis of `extent`
 * tiles starting at `offset`. Returns count + 1 values.
 */
export function getGridPositions(extent: number, count: number, offset = 0): number[] {
    const step = Math.floor(extent / count);
    const positions: number[] = [];
    for (let i = 0; i <= count; i++) {
        positions.push(offset + i * step);
    }
    return positions;
}

function makeCell(cell: Rect): GridCell {
    return {
        cell,
        room: { startX: 0, startY: 0, endX: 0, endY: 0 },
        role: CellRole.Unused,
        invalid: false,
        roomIndex: ROOM_INDEX_HALLWAY,
        connectedUp: false,
        connectedDown: false,
        connectedLeft: false,
        connectedRight: false,
        isKecleonShop: false,
        isMonsterHouse: false,
        isMazeRoom: false,
        isImperfect: false,
        isMerged: false,
        hasSecondaryStructure: false,
    };
}

/** Build the cell grid from boundary coordinates (cols + 1 xs, rows + 1 ys). */
export function initDungeonGrid(xs: readonly number[], ys: readonly number[]): DungeonGrid {
    const cols = xs.length - 1;
    const rows = ys.length - 1;
    const cells: GridCell[][] = [];
    for (let x = 0; x < cols; x++) {
        cells.push([]);
        for (let y = 0; y < rows; y++) {
            cells[x].push(makeCell({ startX: xs[x], startY: ys[y], endX: xs[x + 1], endY: ys[y + 1] }));
        }
    }
    return { cols, rows, cells, xs: [...xs], ys: [...ys] };
}

/**
 * Decide which valid cells hold rooms; the rest become anchors.
 *
 * A negative density asks for exactly |density| rooms, a positive one for
 * density plus up to two more. At least two rooms are kept when the grid
 * has room for them.
 */
export function assignRooms(rng: RandomSource, grid: DungeonGrid, roomDensity: number): number {
    const valid: GridCell[] = [];
    forEachCell(grid, (cell) => {
        if (!cell.invalid) {
            valid.push(cell);
        }
    });

    let roomCount = roomDensity < 0 ? -roomDensity : roomDensity + randInt(rng, 3);
    roomCount = clamp(roomCount, Math.min(MIN_ROOM_COUNT, valid.length), valid.length);

    const isRoom: boolean[] = valid.map((_, i) => i < roomCount);
    shuffleList(rng, isRoom);
    valid.forEach((cell, i) => {
        cell.role = isRoom[i] ? CellRole.Room : CellRole.Anchor;
    });
    return roomCount;
}

// =============================================================================
// Rooms & anchors
// =============================================================================

/** Stamp a room rectangle onto the floor and record it on the cell. */
export function createRoom(floor: FloorGrid, cell: GridCell, room: Rect, roomIndex: number): void {
    cell.role = CellRole.Room;
    cell.room = { ...room };
    cell.roomIndex = roomIndex;
    fillRect(floor, room, (tile) => {
        tile.terrain = Terrain.Normal;
        tile.roomIndex = roomIndex;
    });
}

/** Place a hallway anchor tile and record it on the cell. */
export function createAnchor(floor: FloorGrid, cell: GridCell, pos: Pos): void {
    cell.role = CellRole.Anchor;
    cell.room = { startX: pos.x, startY: pos.y, endX: pos.x + 1, endY: pos.y + 1 };
    cell.roomIndex = ROOM_INDEX_ANCHOR;
    const tile = tileAt(floor, pos.x, pos.y);
    if (tile) {
        tile.terrain = Terrain.Normal;
        tile.roomIndex = ROOM_INDEX_ANCHOR;
    }
}

/**
 * Random room rectangle inside a cell. Rooms keep two tiles clear of the
 * cell's top-left edges and one tile clear of its bottom-right edges, so
 * neighboring rooms never touch and the cell boundary stays free for
 * hallway kinks.
 */
export function randomRoomRect(rng: RandomSource, cell: Rect): Rect {
    const rangeX = Math.max(1, rectWidth(cell) - 3);
    const rangeY = Math.max(1, rectHeight(cell) - 3);

    let sizeX = Math.min(randRange(rng, MIN_ROOM_WIDTH, rangeX), rangeX);
    let sizeY = Math.min(randRange(rng, MIN_ROOM_HEIGHT, rangeY), rangeY);

    // Odd dimensions where they fit, so any room can later hold a maze
    if ((sizeX | 1) <= rangeX) sizeX |= 1;
    if ((sizeY | 1) <= rangeY) sizeY |= 1;

    // Cap the aspect ratio at 3:2
    if (sizeX > Math.floor(sizeY * 3 / 2)) sizeX = Math.floor(sizeY * 3 / 2);
    if (sizeY > Math.floor(sizeX * 3 / 2)) sizeY = Math.floor(sizeX * 3 / 2);

    const startX = cell.startX + 2 + randInt(rng, rangeX - sizeX + 1);
    const startY = cell.startY + 2 + randInt(rng, rangeY - sizeY + 1);
    return { startX, startY, endX: startX + sizeX, endY: startY + sizeY };
}

/** Random anchor position inside a cell, away from the cell edges. */
export function randomAnchorPos(rng: RandomSource, cell: Rect): Pos {
    return {
        x: randRange(rng, cell.startX + 2, Math.max(cell.startX + 2, cell.endX - 3)),
        y: randRange(rng, cell.startY + 2, Math.max(cell.startY + 2, cell.endY - 3)),
    };
}

/**
 * Carve a room or an anchor in every valid cell, column by column. Room
 * indices are handed out in that order starting from `firstRoomIndex`.
 * Returns the next free room index.
 */
export function createRoomsAndAnchors(
    rng: RandomSource,
    floor: FloorGrid,
    grid: DungeonGrid,
    firstRoomIndex = 0,
): number {
    let roomIndex = firstRoomIndex;
    forEachCell(grid, (cell) => {
        if (cell.invalid || cell.role === CellRole.Unused) {
            return;
        }
        if (cell.role === CellRole.Room && roomIndex <= MAX_ROOM_INDEX) {
            createRoom(floor, cell, randomRoomRect(rng, cell.cell), roomIndex);
            roomIndex++;
        } else {
            createAnchor(floor, cell, randomAnchorPos(rng, cell.cell));
        }
    });
    return roomIndex;
}

// =============================================================================
// Connections
// =============================================================================

function isUsable(cell: GridCell | null): cell is GridCell {
    return cell !== null && !cell.invalid && cell.role !== CellRole.Unused;
}

/**
 * Random walk across the grid, connecting each cell it steps into.
 * Makes up to `connectivity` steps and returns the walk's starting cell,
 * or null when the grid has no usable cell.
 */
export function assignRandomGridCellConnections(
    rng: RandomSource,
    grid: DungeonGrid,
    connectivity: number,
): Pos | null {
    const usable: Pos[] = [];
    forEachCell(grid, (cell, x, y) => {
        if (isUsable(cell)) {
            usable.push({ x, y });
        }
    });
    if (usable.length === 0) {
        return null;
    }

    const start = usable[randInt(rng, usable.length)];
    let x = start.x;
    let y = start.y;

    for (let step = 0; step < connectivity; step++) {
        let dir = CARDINAL_DIRECTIONS[randInt(rng, 4)];
        let moved = false;
        for (let attempt = 0; attempt < 4 && !moved; attempt++) {
            const neighbor = neighborCell(grid, x, y, dir);
            if (isUsable(neighbor) && connectCells(grid, x, y, dir)) {
                const [nx, ny] = stepCell(x, y, dir);
                x = nx;
                y = ny;
                moved = true;
            } else {
                dir = CARDINAL_DIRECTIONS[(CARDINAL_DIRECTIONS.indexOf(dir) + 1) % 4];
            }
        }
        if (!moved) {
            break;
        }
    }
    return start;
}

function stepCell(x: number, y: number, dir: Direction): [number, number] {
    switch (dir) {
        case Direction.Up: return [x, y - 1];
        case Direction.Down: return [x, y + 1];
        case Direction.Left: return [x - 1, y];
        case Direction.Right: return [x + 1, y];
        default: return [x, y];
    }
}

/** Cells reachable from (x, y) over connections, as a cols × rows mask. */
export function connectedComponent(grid: DungeonGrid, x: number, y: number): boolean[][] {
    const seen: boolean[][] = grid.cells.map((column) => column.map(() => false));
    const queue: Pos[] = [{ x, y }];
    seen[x][y] = true;
    while (queue.length > 0) {
        const cur = queue.shift();
        if (!cur) {
            break;
        }
        const cell = grid.cells[cur.x][cur.y];
        for (const dir of CARDINAL_DIRECTIONS) {
            if (!isConnected(cell, dir)) {
                continue;
            }
            const [nx, ny] = stepCell(cur.x, cur.y, dir);
            if (nx >= 0 && nx < grid.cols && ny >= 0 && ny < grid.rows && !seen[nx][ny]) {
                seen[nx][ny] = true;
                queue.push({ x: nx, y: ny });
            }
        }
    }
    return seen;
}

function directionsInto(grid: DungeonGrid, x: number, y: number, inComponent: boolean[][]): Direction[] {
    const dirs: Direction[] = [];
    for (const dir of CARDINAL_DIRECTIONS) {
        const neighbor = neighborCell(grid, x, y, dir);
        const [nx, ny] = stepCell(x, y, dir);
        if (isUsable(neighbor) && inComponent[nx][ny]) {
            dirs.push(dir);
        }
    }
    return dirs;
}

function removeAnchor(floor: FloorGrid, grid: DungeonGrid, x: number, y: number): void {
    const cell = grid.cells[x][y];
    for (const dir of CARDINAL_DIRECTIONS) {
        disconnectCells(grid, x, y, dir);
    }
    const tile = tileAt(floor, cell.room.startX, cell.room.startY);
    if (tile && tile.roomIndex === ROOM_INDEX_ANCHOR) {
        tile.terrain = Terrain.Wall;
        tile.roomIndex = ROOM_INDEX_HALLWAY;
    }
    cell.role = CellRole.Unused;
    cell.roomIndex = ROOM_INDEX_HALLWAY;
}

/**
 * Shortest chain of stranded anchors from the component to a stranded room,
 * found breadth-first in column-major order. Connects the chain and marks it
 * part of the component. Returns false when no room can be reached.
 */
function bridgeThroughAnchors(grid: DungeonGrid, inComponent: boolean[][]): boolean {
    const parent: (Pos | null)[][] = grid.cells.map((column) => column.map(() => null));
    const queue: Pos[] = [];
    forEachCell(grid, (_cell, x, y) => {
        if (inComponent[x][y]) {
            queue.push({ x, y });
        }
    });

    for (let head = 0; head < queue.length; head++) {
        const cur = queue[head];
        for (const dir of CARDINAL_DIRECTIONS) {
            const neighbor = neighborCell(grid, cur.x, cur.y, dir);
            const [nx, ny] = stepCell(cur.x, cur.y, dir);
            if (!isUsable(neighbor) || inComponent[nx][ny] || parent[nx][ny]) {
                continue;
            }
            parent[nx][ny] = cur;
            if (neighbor.role === CellRole.Room) {
                connectChain(grid, inComponent, parent, { x: nx, y: ny });
                return true;
            }
            queue.push({ x: nx, y: ny });
        }
    }
    return false;
}

function connectChain(
    grid: DungeonGrid,
    inComponent: boolean[][],
    parent: (Pos | null)[][],
    end: Pos,
): void {
    let cur = end;
    let prev = parent[cur.x][cur.y];
    while (prev && !inComponent[cur.x][cur.y]) {
        connectCells(grid, prev.x, prev.y, directionBetween(prev, cur));
        inComponent[cur.x][cur.y] = true;
        cur = prev;
        prev = parent[cur.x][cur.y];
    }
}

function directionBetween(from: Pos, to: Pos): Direction {
    if (to.x > from.x) return Direction.Right;
    if (to.x < from.x) return Direction.Left;
    return to.y > from.y ? Direction.Down : Direction.Up;
}

function firstRoomIn(grid: DungeonGrid, inComponent: boolean[][]): Pos | null {
    for (let x = 0; x < grid.cols; x++) {
        for (let y = 0; y < grid.rows; y++) {
            if (inComponent[x][y] && grid.cells[x][y].role === CellRole.Room) {
                return { x, y };
            }
        }
    }
    return null;
}

/**
 * Join rooms the random walk missed to the walk's component. Rooms next to
 * the component connect straight to it; otherwise the shortest chain of
 * anchors leading to a stranded room is pulled in. Anchors left outside the
 * component are removed. When dead ends are not allowed, anchors with a
 * single connection gain a second one or are pruned.
 *
 * Rooms that still cannot be reached are left alone; the reachability check
 * rejects such floors.
 */
export function ensureConnectedGrid(
    rng: RandomSource,
    floor: FloorGrid,
    grid: DungeonGrid,
    walkStart: Pos,
    allowDeadEnds: boolean,
): void {
    let inComponent = connectedComponent(grid, walkStart.x, walkStart.y);

    let changed = true;
    while (changed) {
        changed = false;
        forEachCell(grid, (cell, x, y) => {
            if (inComponent[x][y] || cell.invalid || cell.role !== CellRole.Room) {
                return;
            }
            const dirs = directionsInto(grid, x, y, inComponent);
            if (dirs.length > 0) {
                connectCells(grid, x, y, dirs[randInt(rng, dirs.length)]);
                inComponent[x][y] = true;
                changed = true;
            }
        });

        if (changed) {
            continue;
        }

        changed = bridgeThroughAnchors(grid, inComponent);
    }

    forEachCell(grid, (cell, x, y) => {
        if (!inComponent[x][y] && cell.role === CellRole.Anchor) {
            removeAnchor(floor, grid, x, y);
        }
    });

    if (allowDeadEnds) {
        return;
    }

    // Rooms are never pruned, so one of them roots the component from here on
    const root = firstRoomIn(grid, inComponent) ?? walkStart;
    changed = true;
    while (changed) {
        changed = false;
        inComponent = connectedComponent(grid, root.x, root.y);
        forEachCell(grid, (cell, x, y) => {
            if (cell.role !== CellRole.Anchor || connectionCount(cell) !== 1) {
                return;
            }
            const dirs = directionsInto(grid, x, y, inComponent).filter((dir) => !isConnected(cell, dir));
            if (dirs.length > 0) {
                connectCells(grid, x, y, dirs[randInt(rng, dirs.length)]);
            } else {
                removeAnchor(floor, grid, x, y);
            }
            changed = true;
        });
    }
}

// =============================================================================
// Room merging
// =============================================================================

/**
 * Merge the rooms of `count` vertically stacked cells starting at (x, y0)
 * into one room spanning all of them. The merged room takes the top cell's
 * room index. Returns false when any of the cells is not a room.
 */
export function mergeRoomsVertically(
    floor: FloorGrid,
    grid: DungeonGrid,
    x: number,
    y0: number,
    count: number,
): boolean {
    const cells: GridCell[] = [];
    for (let y = y0; y < y0 + count; y++) {
        const cell = grid.cells[x]?.[y];
        if (!cell || cell.role !== CellRole.Room) {
            return false;
        }
        cells.push(cell);
    }
    const top = cells[0];
    const merged: Rect = {
        startX: Math.min(...cells.map((c) => c.room.startX)),
        startY: top.room.startY,
        endX: Math.max(...cells.map((c) => c.room.endX)),
        endY: cells[cells.length - 1].room.endY,
    };
    for (let i = 0; i < cells.length; i++) {
        createRoom(floor, cells[i], merged, top.roomIndex);
        cells[i].isMerged = true;
        if (i > 0) {
            disconnectCells(grid, x, y0 + i, Direction.Up);
        }
    }
    return true;
}
