/*
 *  flags.ts — Bitfield flag constants for tiles and floor properties
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

/**
 * Fl(N): unsigned 32-bit flag at bit position N.
 */
export function Fl(n: number): number {
    return (1 << n) >>> 0;
}

// ===== Tile flags =====

export const TileFlag = {
    NATURAL_JUNCTION:           Fl(3),
    IMPASSABLE:                 Fl(4),
    IN_KECLEON_SHOP:            Fl(5),
    IN_MONSTER_HOUSE:           Fl(6),
    UNBREAKABLE:                Fl(8),
    STAIRS:                     Fl(9),
    KEY_DOOR:                   Fl(11),
    KEY_DOOR_KEY_LOCKED:        Fl(12),
    KEY_DOOR_ESCORT_LOCKED:     Fl(13),
    UNREACHABLE_FROM_STAIRS:    Fl(15),
} as const;

/** Tiles entities never spawn on. */
export const SPECIAL_TILE = (
    TileFlag.KEY_DOOR | TileFlag.KEY_DOOR_KEY_LOCKED | TileFlag.KEY_DOOR_ESCORT_LOCKED
) >>> 0;

// ===== Spawn flags =====

export const SpawnFlag = {
    STAIRS:     Fl(0),
    ITEM:       Fl(1),
    TRAP:       Fl(2),
    ENEMY:      Fl(3),
    PLAYER:     Fl(4),
} as const;

export const ANY_SPAWN = (
    SpawnFlag.STAIRS | SpawnFlag.ITEM | SpawnFlag.TRAP | SpawnFlag.ENEMY | SpawnFlag.PLAYER
) >>> 0;

// ===== Floor feature flags =====

export const FloorFeature = {
    IMPERFECT_ROOMS:        Fl(0),
    SECONDARY_TERRAIN:      Fl(1),
    SECONDARY_STRUCTURES:   Fl(2),
} as const;

export const ALL_FLOOR_FEATURES = (
    FloorFeature.IMPERFECT_ROOMS | FloorFeature.SECONDARY_TERRAIN | FloorFeature.SECONDARY_STRUCTURES
) >>> 0;
