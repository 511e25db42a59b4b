/*
 *  helpers.ts — Shared helpers for the architect phases
 *  floor-architect
 *
 *  Direction arithmetic, rectangle and grid-cell helpers, and neighborhood
 *  queries on the tile grid.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { DungeonGrid, FloorGrid, GridCell, Rect } from "../types/types.js";
import { CellRole, Direction } from "../types/enums.js";
import { nbDirs } from "../globals/tables.js";
import { isHallway, tileAt } from "../grid/floor.js";

// =============================================================================
// Directions
// =============================================================================

export function oppositeDirection(theDir: Direction): Direction {
    switch (theDir) {
        case Direction.Up:        return Direction.Down;
        case Direction.Down:      return Direction.Up;
        case Direction.Left:      return Direction.Right;
        case Direction.Right:     return Direction.Left;
        default:                  return Direction.NoDirection;
    }
}

/** Rotate a quarter turn clockwise. */
export function clockwise(theDir: Direction): Direction {
    switch (theDir) {
        case Direction.Up:        return Direction.Right;
        case Direction.Right:     return Direction.Down;
        case Direction.Down:      return Direction.Left;
        case Direction.Left:      return Direction.Up;
        default:                  return Direction.NoDirection;
    }
}

export function dirDelta(theDir: Direction): readonly [number, number] {
    return theDir === Direction.NoDirection ? [0, 0] : nbDirs[theDir];
}

// =============================================================================
// Rectangles
// =============================================================================

export function rectWidth(rect: Rect): number {
    return rect.endX - rect.startX;
}

export function rectHeight(rect: Rect): number {
    return rect.endY - rect.startY;
}

export function rectContains(rect: Rect, x: number, y: number): boolean {
    return x >= rect.startX && x < rect.endX && y >= rect.startY && y < rect.endY;
}

export function insetRect(rect: Rect, by: number): Rect {
    return {
        startX: rect.startX + by,
        startY: rect.startY + by,
        endX: rect.endX - by,
        endY: rect.endY - by,
    };
}

// =============================================================================
// Grid cells
// =============================================================================

/** Visit every cell, column by column. */
export function forEachCell(grid: DungeonGrid, fn: (cell: GridCell, x: number, y: number) => void): void {
    for (let x = 0; x < grid.cols; x++) {
        for (let y = 0; y < grid.rows; y++) {
            fn(grid.cells[x][y], x, y);
        }
    }
}

/** Cell next to (x, y) in a direction, or null off the grid. */
export function neighborCell(grid: DungeonGrid, x: number, y: number, dir: Direction): GridCell | null {
    const [dx, dy] = dirDelta(dir);
    const nx = x + dx;
    const ny = y + dy;
    if (nx < 0 || nx >= grid.cols || ny < 0 || ny >= grid.rows) {
        return null;
    }
    return grid.cells[nx][ny];
}

export function isConnected(cell: GridCell, dir: Direction): boolean {
    switch (dir) {
        case Direction.Up:        return cell.connectedUp;
        case Direction.Down:      return cell.connectedDown;
        case Direction.Left:      return cell.connectedLeft;
        case Direction.Right:     return cell.connectedRight;
        default:                  return false;
    }
}

function setConnected(cell: GridCell, dir: Direction, value: boolean): void {
    switch (dir) {
        case Direction.Up:        cell.connectedUp = value; break;
        case Direction.Down:      cell.connectedDown = value; break;
        case Direction.Left:      cell.connectedLeft = value; break;
        case Direction.Right:     cell.connectedRight = value; break;
        default:                  break;
    }
}

/**
 * Connect (x, y) to its neighbor in `dir`, on both sides. Returns false when
 * the neighbor is off the grid or either cell is invalid.
 */
export function connectCells(grid: DungeonGrid, x: number, y: number, dir: Direction): boolean {
    const cell = grid.cells[x][y];
    const other = neighborCell(grid, x, y, dir);
    if (!other || cell.invalid || other.invalid) {
        return false;
    }
    setConnected(cell, dir, true);
    setConnected(other, oppositeDirection(dir), true);
    return true;
}

export function disconnectCells(grid: DungeonGrid, x: number, y: number, dir: Direction): void {
    const other = neighborCell(grid, x, y, dir);
    setConnected(grid.cells[x][y], dir, false);
    if (other) {
        setConnected(other, oppositeDirection(dir), false);
    }
}

export function connectionCount(cell: GridCell): number {
    return Number(cell.connectedUp) + Number(cell.connectedDown)
        + Number(cell.connectedLeft) + Number(cell.connectedRight);
}

/** A room cell that carries no special role yet. */
export function isPlainRoom(cell: GridCell): boolean {
    return cell.role === CellRole.Room
        && !cell.invalid
        && !cell.isMerged
        && !cell.isKecleonShop
        && !cell.isMonsterHouse
        && !cell.isMazeRoom;
}

// =============================================================================
// Tile neighborhoods
// =============================================================================

/** True when the tile is a hallway or has a cardinal hallway neighbor. */
export function isNextToHallway(floor: FloorGrid, x: number, y: number): boolean {
    for (let dir = -1; dir < 4; dir++) {
        const [dx, dy] = dir < 0 ? [0, 0] : nbDirs[dir];
        const tile = tileAt(floor, x + dx, y + dy);
        if (tile && isHallway(tile)) {
            return true;
        }
    }
    return false;
}

