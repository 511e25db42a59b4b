/*
 *  types.ts — Shared data model for floor generation
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type {
    Terrain, CellRole, EntityKind, HiddenStairsType, ItemPlacement,
} from "./enums.js";

// ===== Positions =====

export interface Pos {
    x: number;
    y: number;
}

/** Half-open rectangle: covers [startX, endX) × [startY, endY). */
export interface Rect {
    startX: number;
    startY: number;
    endX: number;
    endY: number;
}

// ===== Tiles =====

export interface Tile {
    terrain: Terrain;
    /** Room identifier, ROOM_INDEX_HALLWAY or ROOM_INDEX_ANCHOR. */
    roomIndex: number;
    /** TileFlag bits. */
    flags: number;
    /** SpawnFlag bits. */
    spawnFlags: number;
}

/** The tile arena for one generation run. Column-major: `tiles[x][y]`. */
export interface FloorGrid {
    readonly width: number;
    readonly height: number;
    readonly tiles: Tile[][];
}

// ===== Grid layout =====

export interface GridCell {
    /** Cell boundary in tile space. */
    cell: Rect;
    /** Room rectangle, or the 1×1 anchor tile. Zero-sized until created. */
    room: Rect;
    role: CellRole;
    /** Excluded by the layout; never holds a room, anchor or connection. */
    invalid: boolean;
    roomIndex: number;
    connectedUp: boolean;
    connectedDown: boolean;
    connectedLeft: boolean;
    connectedRight: boolean;
    isKecleonShop: boolean;
    isMonsterHouse: boolean;
    isMazeRoom: boolean;
    isImperfect: boolean;
    isMerged: boolean;
    hasSecondaryStructure: boolean;
}

export interface DungeonGrid {
    readonly cols: number;
    readonly rows: number;
    /** Column-major: `cells[x][y]`. */
    readonly cells: GridCell[][];
    /** cols + 1 boundary x coordinates. */
    readonly xs: readonly number[];
    /** rows + 1 boundary y coordinates. */
    readonly ys: readonly number[];
}

// ===== Spawns =====

export interface WeightedEntry {
    id: number;
    weight: number;
}

interface SpawnRecordBase {
    pos: Pos;
}

export interface StairsSpawn extends SpawnRecordBase {
    kind: EntityKind.Stairs;
}

export interface HiddenStairsSpawn extends SpawnRecordBase {
    kind: EntityKind.HiddenStairs;
    hiddenStairsType: HiddenStairsType;
}

export interface ItemSpawn extends SpawnRecordBase {
    kind: EntityKind.Item;
    /** null when the floor has no item table. */
    itemId: number | null;
    placement: ItemPlacement;
}

export interface TrapSpawn extends SpawnRecordBase {
    kind: EntityKind.Trap;
    trapId: number | null;
}

export interface EnemySpawn extends SpawnRecordBase {
    kind: EntityKind.Enemy;
    enemyId: number | null;
    inMonsterHouse: boolean;
}

export interface PlayerSpawn extends SpawnRecordBase {
    kind: EntityKind.Player;
}

export type SpawnRecord =
    | StairsSpawn
    | HiddenStairsSpawn
    | ItemSpawn
    | TrapSpawn
    | EnemySpawn
    | PlayerSpawn;

export type { FloorProperties, FloorPropertiesInput } from "../config/floor-properties.js";
