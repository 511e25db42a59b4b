/*
 *  floor-text.ts — ASCII form of a floor, for fixtures, fixed-room data and
 *  diagnostics
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { FloorGrid, Tile } from "../types/types.js";
import { Terrain } from "../types/enums.js";
import { ROOM_INDEX_ANCHOR, ROOM_INDEX_HALLWAY } from "../types/constants.js";
import { TileFlag } from "../types/flags.js";
import { forEachTile } from "./floor.js";

/**
 * Tile characters:
 *
 *   #  wall              X  impassable wall
 *   .  room 0 floor      0-9 floor of that room
 *   ,  hallway floor     o  hallway anchor
 *   ~  secondary terrain _  chasm
 *   K  key door (room 0 floor)
 */
export const FLOOR_CHARS = {
    wall: "#",
    impassable: "X",
    room: ".",
    hallway: ",",
    anchor: "o",
    secondary: "~",
    chasm: "_",
    keyDoor: "K",
} as const;

function tileFromChar(ch: string): Tile {
    const tile: Tile = {
        terrain: Terrain.Wall,
        roomIndex: ROOM_INDEX_HALLWAY,
        flags: 0,
        spawnFlags: 0,
    };
    switch (ch) {
        case FLOOR_CHARS.wall:
            break;
        case FLOOR_CHARS.impassable:
            tile.flags |= TileFlag.IMPASSABLE;
            break;
        case FLOOR_CHARS.room:
            tile.terrain = Terrain.Normal;
            tile.roomIndex = 0;
            break;
        case FLOOR_CHARS.hallway:
            tile.terrain = Terrain.Normal;
            break;
        case FLOOR_CHARS.anchor:
            tile.terrain = Terrain.Normal;
            tile.roomIndex = ROOM_INDEX_ANCHOR;
            break;
        case FLOOR_CHARS.secondary:
            tile.terrain = Terrain.Secondary;
            break;
        case FLOOR_CHARS.chasm:
            tile.terrain = Terrain.Chasm;
            break;
        case FLOOR_CHARS.keyDoor:
            tile.terrain = Terrain.Normal;
            tile.roomIndex = 0;
            tile.flags |= TileFlag.KEY_DOOR;
            break;
        default:
            if (ch >= "0" && ch <= "9") {
                tile.terrain = Terrain.Normal;
                tile.roomIndex = ch.charCodeAt(0) - 48;
            } else {
                throw new Error(`Unknown floor character '${ch}'`);
            }
    }
    return tile;
}

/**
 * Build a floor from rows of tile characters. All rows must share one
 * length. No border is added: what the rows say is what the floor holds.
 */
export function floorFromText(rows: readonly string[]): FloorGrid {
    const height = rows.length;
    const width = height > 0 ? rows[0].length : 0;
    const tiles: Tile[][] = new Array(width);
    for (let x = 0; x < width; x++) {
        tiles[x] = new Array<Tile>(height);
    }
    rows.forEach((row, y) => {
        if (row.length !== width) {
            throw new Error(`Row ${y} has length ${row.length}, expected ${width}`);
        }
        for (let x = 0; x < width; x++) {
            tiles[x][y] = tileFromChar(row[x]);
        }
    });
    return { width, height, tiles };
}

function charForTile(tile: Tile): string {
    switch (tile.terrain) {
        case Terrain.Secondary:
            return FLOOR_CHARS.secondary;
        case Terrain.Chasm:
            return FLOOR_CHARS.chasm;
        case Terrain.Wall:
            return tile.flags & TileFlag.IMPASSABLE ? FLOOR_CHARS.impassable : FLOOR_CHARS.wall;
        default:
            if (tile.flags & TileFlag.KEY_DOOR) {
                return FLOOR_CHARS.keyDoor;
            }
            if (tile.roomIndex === ROOM_INDEX_ANCHOR) {
                return FLOOR_CHARS.anchor;
            }
            return tile.roomIndex === ROOM_INDEX_HALLWAY ? FLOOR_CHARS.hallway : FLOOR_CHARS.room;
    }
}

/** Render a floor as rows of tile characters. Room floors all render as '.'. */
export function floorToText(floor: FloorGrid): string[] {
    const rows: string[] = new Array<string>(floor.height).fill("");
    forEachTile(floor, (tile, _x, y) => {
        rows[y] += charForTile(tile);
    });
    return rows;
}
