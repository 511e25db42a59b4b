/*
 *  junctions.ts — Junction flagging between hallways and rooms
 *  floor-architect
 *
 *  The scan is row-major and reclassifies anchors as it reaches them. An
 *  anchor scanned after one of its hallway neighbors is still an anchor when
 *  that neighbor flags it, so it keeps the junction flag; an anchor scanned
 *  before its hallway neighbors is already hallway by the time they look at
 *  it. Callers see this asymmetry and the scan order must not change.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { FloorGrid } from "../types/types.js";
import { ROOM_INDEX_ANCHOR, ROOM_INDEX_HALLWAY } from "../types/constants.js";
import { TileFlag } from "../types/flags.js";
import { nbDirs } from "../globals/tables.js";
import { isHallway, isOpen, tileAt } from "../grid/floor.js";

function flagNeighbors(floor: FloorGrid, x: number, y: number): void {
    for (let dir = 0; dir < 4; dir++) {
        const neighbor = tileAt(floor, x + nbDirs[dir][0], y + nbDirs[dir][1]);
        if (neighbor && isOpen(neighbor) && neighbor.roomIndex !== ROOM_INDEX_HALLWAY) {
            neighbor.flags |= TileFlag.NATURAL_JUNCTION;
        }
    }
}

/** Resolve anchors to hallway and flag room tiles touching hallways. */
export function finalizeJunctions(floor: FloorGrid): void {
    for (let y = 0; y < floor.height; y++) {
        for (let x = 0; x < floor.width; x++) {
            const tile = floor.tiles[x][y];
            if (!isOpen(tile)) {
                continue;
            }
            if (tile.roomIndex === ROOM_INDEX_ANCHOR) {
                tile.roomIndex = ROOM_INDEX_HALLWAY;
            }
            if (isHallway(tile)) {
                flagNeighbors(floor, x, y);
            }
        }
    }
}

/**
 * Junction flagging over [x0, x1) × [y0, y1) only, leaving anchors alone.
 * Used around stamped fixed rooms.
 */
export function flagHallwayJunctions(floor: FloorGrid, x0: number, y0: number, x1: number, y1: number): void {
    for (let y = Math.max(0, y0); y < Math.min(floor.height, y1); y++) {
        for (let x = Math.max(0, x0); x < Math.min(floor.width, x1); x++) {
            if (isHallway(floor.tiles[x][y])) {
                flagNeighbors(floor, x, y);
            }
        }
    }
}
