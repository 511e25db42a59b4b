/*
 *  spawns.ts — Entity placement: eligibility table, placement passes and
 *  spawn conflict resolution
 *  floor-architect
 *
 *  Each placement kind is eligible on the tiles that pass every predicate in
 *  its SPAWN_ELIGIBILITY row. Eligible tiles are shuffled and consumed in
 *  order, so a kind never favors the top-left of the floor.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { DungeonGrid, FloorGrid, FloorProperties, Pos, SpawnRecord, Tile } from "../types/types.js";
import { EntityKind, HiddenStairsType, ItemPlacement, PlacementKind, Terrain } from "../types/enums.js";
import {
    EMPTY_MONSTER_HOUSE_ENEMY_COUNT, HIDDEN_STAIRS_MIN_FLOORS_REMAINING, MAX_MONSTER_HOUSE_ENEMIES,
    ROOM_INDEX_ANCHOR, ROOM_INDEX_HALLWAY,
} from "../types/constants.js";
import { ANY_SPAWN, SPECIAL_TILE, SpawnFlag, TileFlag } from "../types/flags.js";
import { findTiles, isOpen } from "../grid/floor.js";
import { type RandomSource, pickWeighted, randInt, randRange, shuffleList } from "../math/rng.js";
import { flagMonsterHouse } from "./features.js";

// =============================================================================
// Tile predicates
// =============================================================================

export type TilePredicate = (tile: Tile) => boolean;

export const open: TilePredicate = (tile) => isOpen(tile);
export const inRoom: TilePredicate = (tile) =>
    tile.roomIndex !== ROOM_INDEX_HALLWAY && tile.roomIndex !== ROOM_INDEX_ANCHOR;
export const isWall: TilePredicate = (tile) => tile.terrain === Terrain.Wall;
export const inShop: TilePredicate = (tile) => (tile.flags & TileFlag.IN_KECLEON_SHOP) !== 0;
export const inMonsterHouse: TilePredicate = (tile) => (tile.flags & TileFlag.IN_MONSTER_HOUSE) !== 0;
export const notShop: TilePredicate = (tile) => !inShop(tile);
export const notMonsterHouse: TilePredicate = (tile) => !inMonsterHouse(tile);
export const notJunction: TilePredicate = (tile) => !(tile.flags & TileFlag.NATURAL_JUNCTION);
export const notSpecial: TilePredicate = (tile) => !(tile.flags & SPECIAL_TILE);

/** No spawn flag from `mask` is set on the tile. */
export function noSpawn(mask: number): TilePredicate {
    return (tile) => !(tile.spawnFlags & mask);
}

export function allOf(predicates: readonly TilePredicate[]): TilePredicate {
    return (tile) => predicates.every((predicate) => predicate(tile));
}

// =============================================================================
// Eligibility table
// =============================================================================

const STAIRS_RULES: readonly TilePredicate[] = [
    open, inRoom, notShop, noSpawn(SpawnFlag.ENEMY), notJunction, notSpecial,
];
const MONSTER_HOUSE_LOOT_RULES: readonly TilePredicate[] = [inMonsterHouse, notShop, notJunction];

export const SPAWN_ELIGIBILITY: Readonly<Record<PlacementKind, readonly TilePredicate[]>> = Object.freeze({
    [PlacementKind.Stairs]: STAIRS_RULES,
    // Never on the stairs themselves
    [PlacementKind.HiddenStairs]: [...STAIRS_RULES, noSpawn(SpawnFlag.STAIRS)],
    [PlacementKind.Item]: [open, inRoom, notShop, notMonsterHouse, notJunction, notSpecial],
    [PlacementKind.BuriedItem]: [isWall],
    [PlacementKind.MonsterHouseItem]: MONSTER_HOUSE_LOOT_RULES,
    [PlacementKind.ShopItem]: [open, inShop, notSpecial],
    [PlacementKind.Trap]: [open, inRoom, notShop, noSpawn(SpawnFlag.ITEM | SpawnFlag.ENEMY), notSpecial],
    [PlacementKind.MonsterHouseTrap]: MONSTER_HOUSE_LOOT_RULES,
    [PlacementKind.Player]: [
        open, inRoom, notShop, notJunction,
        noSpawn(SpawnFlag.ITEM | SpawnFlag.ENEMY | SpawnFlag.TRAP), notSpecial,
    ],
    [PlacementKind.Enemy]: [open, notShop, noSpawn(ANY_SPAWN), notSpecial],
    [PlacementKind.MonsterHouseEnemy]: [inMonsterHouse, notShop, noSpawn(SpawnFlag.PLAYER), notSpecial],
});

export function isEligible(tile: Tile, kind: PlacementKind): boolean {
    return allOf(SPAWN_ELIGIBILITY[kind])(tile);
}

/** Tiles eligible for a placement kind, in row-major order. */
export function eligibleTiles(floor: FloorGrid, kind: PlacementKind): Pos[] {
    const rule = allOf(SPAWN_ELIGIBILITY[kind]);
    return findTiles(floor, (tile) => rule(tile));
}

// =============================================================================
// Counts
// =============================================================================

/** Entity count for a density: negative means exactly |density|, else density ± 1. */
export function densityCount(rng: RandomSource, density: number): number {
    if (density < 0) {
        return -density;
    }
    if (density === 0) {
        return 0;
    }
    return randRange(rng, density - 1, density + 1);
}

// =============================================================================
// Placement
// =============================================================================

export interface SpawnContext {
    rng: RandomSource;
    floor: FloorGrid;
    properties: FloorProperties;
    /** Records in placement order. */
    records: SpawnRecord[];
    /** Messages about mandatory entities that found no eligible tile. */
    diagnostics: string[];
    /** Cells to tag when a rescue floor turns the stairs room into a Monster House. */
    grid?: DungeonGrid | null;
}

/**
 * Flag up to `count` shuffled eligible tiles and hand each position to
 * `record`. Tiles that already carry `spawnFlag` are skipped, so one tile
 * never holds two records of a kind. Returns the number placed.
 */
function place(
    ctx: SpawnContext,
    kind: PlacementKind,
    count: number,
    spawnFlag: number,
    record: (pos: Pos) => SpawnRecord,
): number {
    if (count <= 0) {
        return 0;
    }
    const tiles = eligibleTiles(ctx.floor, kind)
        .filter((pos) => !(ctx.floor.tiles[pos.x][pos.y].spawnFlags & spawnFlag));
    shuffleList(ctx.rng, tiles);
    const placed = Math.min(count, tiles.length);
    for (let i = 0; i < placed; i++) {
        const pos = tiles[i];
        ctx.floor.tiles[pos.x][pos.y].spawnFlags |= spawnFlag;
        ctx.records.push(record(pos));
    }
    return placed;
}

export function stairsPosition(floor: FloorGrid): Pos | null {
    return findTiles(floor, (tile) => (tile.flags & TileFlag.STAIRS) !== 0)[0] ?? null;
}

/**
 * Place the stairs unless the floor already has them. On a rescue floor the
 * room holding the stairs becomes a Monster House. Returns the stairs
 * position, or null when no tile is eligible.
 */
export function spawnStairs(ctx: SpawnContext): Pos | null {
    const existing = stairsPosition(ctx.floor);
    if (existing) {
        return existing;
    }
    const tiles = eligibleTiles(ctx.floor, PlacementKind.Stairs);
    if (tiles.length === 0) {
        ctx.diagnostics.push("No eligible tile for the stairs");
        return null;
    }
    const pos = tiles[randInt(ctx.rng, tiles.length)];
    const tile = ctx.floor.tiles[pos.x][pos.y];
    tile.flags |= TileFlag.STAIRS;
    tile.spawnFlags |= SpawnFlag.STAIRS;
    ctx.records.push({ kind: EntityKind.Stairs, pos });

    if (ctx.properties.rescueFloor) {
        flagMonsterHouse(ctx.floor, tile.roomIndex);
        for (const column of ctx.grid?.cells ?? []) {
            for (const cell of column) {
                if (!cell.invalid && cell.roomIndex === tile.roomIndex) {
                    cell.isMonsterHouse = true;
                }
            }
        }
    }
    return pos;
}

/**
 * Stairs (when missing), hidden stairs, items, traps and the player. An
 * empty Monster House gets no items or traps.
 */
export function spawnNonEnemies(ctx: SpawnContext, emptyMonsterHouse: boolean): void {
    const { rng, properties } = ctx;
    spawnStairs(ctx);

    if (
        properties.hiddenStairsType !== HiddenStairsType.None
        && properties.floorsRemaining >= HIDDEN_STAIRS_MIN_FLOORS_REMAINING
    ) {
        place(ctx, PlacementKind.HiddenStairs, 1, SpawnFlag.STAIRS, (pos) => ({
            kind: EntityKind.HiddenStairs,
            pos,
            hiddenStairsType: properties.hiddenStairsType,
        }));
    }

    const item = (placement: ItemPlacement) => (pos: Pos): SpawnRecord => ({
        kind: EntityKind.Item,
        pos,
        itemId: pickWeighted(rng, properties.itemTable),
        placement,
    });
    const trap = (pos: Pos): SpawnRecord => ({
        kind: EntityKind.Trap,
        pos,
        trapId: pickWeighted(rng, properties.trapTable),
    });

    place(ctx, PlacementKind.Item, densityCount(rng, properties.itemDensity), SpawnFlag.ITEM,
        item(ItemPlacement.Room));
    place(ctx, PlacementKind.BuriedItem, densityCount(rng, properties.buriedItemDensity), SpawnFlag.ITEM,
        item(ItemPlacement.Buried));

    if (!emptyMonsterHouse) {
        const houseTiles = eligibleTiles(ctx.floor, PlacementKind.MonsterHouseItem).length;
        if (houseTiles > 0) {
            place(ctx, PlacementKind.MonsterHouseItem,
                randRange(rng, Math.floor(houseTiles / 8), Math.floor(houseTiles / 5)),
                SpawnFlag.ITEM, item(ItemPlacement.MonsterHouse));
        }
    }

    const shopTiles = eligibleTiles(ctx.floor, PlacementKind.ShopItem).length;
    place(ctx, PlacementKind.ShopItem, shopTiles, SpawnFlag.ITEM, item(ItemPlacement.Shop));

    place(ctx, PlacementKind.Trap, densityCount(rng, properties.trapDensity), SpawnFlag.TRAP, trap);

    if (!emptyMonsterHouse) {
        const houseTiles = eligibleTiles(ctx.floor, PlacementKind.MonsterHouseTrap).length;
        if (houseTiles > 0) {
            place(ctx, PlacementKind.MonsterHouseTrap,
                randRange(rng, Math.floor(houseTiles / 10), Math.floor(houseTiles / 6)),
                SpawnFlag.TRAP, trap);
        }
    }

    const player = place(ctx, PlacementKind.Player, 1, SpawnFlag.PLAYER, (pos) => ({ kind: EntityKind.Player, pos }));
    if (player === 0) {
        ctx.diagnostics.push("No eligible tile for the player");
    }
}

/** Normal enemies, then Monster House enemies. */
export function spawnEnemies(ctx: SpawnContext, emptyMonsterHouse: boolean): void {
    const { rng, properties } = ctx;
    const enemy = (inHouse: boolean) => (pos: Pos): SpawnRecord => ({
        kind: EntityKind.Enemy,
        pos,
        enemyId: pickWeighted(rng, properties.enemyTable),
        inMonsterHouse: inHouse,
    });

    place(ctx, PlacementKind.Enemy, densityCount(rng, properties.enemyDensity), SpawnFlag.ENEMY, enemy(false));

    const houseTiles = eligibleTiles(ctx.floor, PlacementKind.MonsterHouseEnemy).length;
    if (houseTiles === 0) {
        return;
    }
    const count = emptyMonsterHouse
        ? EMPTY_MONSTER_HOUSE_ENEMY_COUNT
        : Math.min(MAX_MONSTER_HOUSE_ENEMIES, randRange(rng, Math.floor(houseTiles / 4), Math.floor(houseTiles / 3)));
    place(ctx, PlacementKind.MonsterHouseEnemy, count, SpawnFlag.ENEMY, enemy(true));
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Clear spawn flags that cannot stand. Only items survive on tiles that are
 * not open floor. Stairs beat items and traps, items beat traps, and the
 * player beats enemies.
 */
export function resolveInvalidSpawns(floor: FloorGrid): void {
    for (const column of floor.tiles) {
        for (const tile of column) {
            if (!isOpen(tile)) {
                tile.spawnFlags &= SpawnFlag.ITEM;
            }
            if (tile.spawnFlags & SpawnFlag.STAIRS) {
                tile.spawnFlags &= ~(SpawnFlag.ITEM | SpawnFlag.TRAP);
            }
            if (tile.spawnFlags & SpawnFlag.ITEM) {
                tile.spawnFlags &= ~SpawnFlag.TRAP;
            }
            if (tile.spawnFlags & SpawnFlag.PLAYER) {
                tile.spawnFlags &= ~SpawnFlag.ENEMY;
            }
        }
    }
}

export function spawnFlagForKind(kind: EntityKind): number {
    switch (kind) {
        case EntityKind.Stairs:
        case EntityKind.HiddenStairs:
            return SpawnFlag.STAIRS;
        case EntityKind.Item:
            return SpawnFlag.ITEM;
        case EntityKind.Trap:
            return SpawnFlag.TRAP;
        case EntityKind.Enemy:
            return SpawnFlag.ENEMY;
        case EntityKind.Player:
            return SpawnFlag.PLAYER;
    }
}

/** Records whose spawn flag is still set on their tile, in placement order. */
export function survivingSpawns(floor: FloorGrid, records: readonly SpawnRecord[]): SpawnRecord[] {
    return records.filter((record) => (floor.tiles[record.pos.x][record.pos.y].spawnFlags & spawnFlagForKind(record.kind)) !== 0);
}
