/*
 *  constants.ts — Floor dimensions, room index sentinels and generation limits
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { FloorLayout } from "./enums.js";

// ----- Floor dimensions -----

export const DEFAULT_FLOOR_WIDTH = 56;
export const DEFAULT_FLOOR_HEIGHT = 32;

export const MIN_FLOOR_WIDTH = 24;
export const MAX_FLOOR_WIDTH = 128;
export const MIN_FLOOR_HEIGHT = 16;
export const MAX_FLOOR_HEIGHT = 64;

// ----- Room indices -----

/** Room index of hallways, and of every tile that no room has claimed. */
export const ROOM_INDEX_HALLWAY = 0xFF;
/** Room index of a hallway anchor until junctions are finalized. */
export const ROOM_INDEX_ANCHOR = 0xFE;
/** Highest room index a generated room can take. */
export const MAX_ROOM_INDEX = 0xEF;

// ----- Grid layout -----

export const MAX_GRID_COLS = 6;
export const MAX_GRID_ROWS = 4;

/** Cells narrower or shorter than this collapse the grid to a single column or row. */
export const MIN_GRID_CELL_WIDTH = 8;
export const MIN_GRID_CELL_HEIGHT = 8;

export const MIN_ROOM_WIDTH = 5;
export const MIN_ROOM_HEIGHT = 4;

/** Fewest rooms a generated grid may hold. */
export const MIN_ROOM_COUNT = 2;

export interface FloorSize {
    width: number;
    height: number;
}

const GRID_FLOOR_MIN: FloorSize = { width: MIN_FLOOR_WIDTH, height: MIN_FLOOR_HEIGHT };

/**
 * Smallest floor on which every cell of a layout's grid is at least
 * MIN_GRID_CELL_WIDTH × MIN_GRID_CELL_HEIGHT. Standard layouts and
 * OuterRooms clamp their grid to the floor instead.
 */
export const LAYOUT_MIN_FLOOR_SIZE: Readonly<Record<FloorLayout, FloorSize>> = Object.freeze({
    [FloorLayout.Large]: GRID_FLOOR_MIN,
    [FloorLayout.Small]: GRID_FLOOR_MIN,
    [FloorLayout.OneRoomMonsterHouse]: GRID_FLOOR_MIN,
    // Four room columns and two room rows inside a 6-wide, 5-tall anchor ring
    [FloorLayout.OuterRing]: { width: 12 + 4 * MIN_GRID_CELL_WIDTH, height: 10 + 2 * MIN_GRID_CELL_HEIGHT },
    [FloorLayout.Crossroads]: { width: 5 * MIN_GRID_CELL_WIDTH, height: 4 * MIN_GRID_CELL_HEIGHT },
    [FloorLayout.TwoRoomsWithMonsterHouse]: GRID_FLOOR_MIN,
    [FloorLayout.Line]: { width: 5 * MIN_GRID_CELL_WIDTH, height: MIN_FLOOR_HEIGHT },
    [FloorLayout.Cross]: { width: MIN_FLOOR_WIDTH, height: 3 * MIN_GRID_CELL_HEIGHT },
    [FloorLayout.Medium]: GRID_FLOOR_MIN,
    [FloorLayout.Beetle]: { width: MIN_FLOOR_WIDTH, height: 3 * MIN_GRID_CELL_HEIGHT },
    [FloorLayout.OuterRooms]: GRID_FLOOR_MIN,
});

// ----- Features -----

/** Longest walk an extra hallway may take before it gives up. */
export const EXTRA_HALLWAY_MAX_LENGTH = 20;

export const RIVER_RUN_MIN = 2;
export const RIVER_RUN_MAX = 7;
/** Percent chance that a river ends in a lake after each meander. */
export const RIVER_LAKE_CHANCE = 10;

export const LAKE_RADIUS_MIN = 2;
export const LAKE_RADIUS_MAX = 4;

export const MAZE_MIN_WIDTH = 5;
export const MAZE_MIN_HEIGHT = 5;

export const KECLEON_SHOP_MIN_WIDTH = 5;
export const KECLEON_SHOP_MIN_HEIGHT = 4;

export const SECONDARY_STRUCTURE_CHANCE = 30;
export const ROOM_IMPERFECTION_CHANCE = 40;

// ----- Entities -----

/** Hidden stairs only appear when at least this many floors remain. */
export const HIDDEN_STAIRS_MIN_FLOORS_REMAINING = 2;

export const EMPTY_MONSTER_HOUSE_ENEMY_COUNT = 3;
export const MAX_MONSTER_HOUSE_ENEMIES = 30;

// ----- Orchestration -----

export const MAX_GENERATION_ATTEMPTS = 10;
