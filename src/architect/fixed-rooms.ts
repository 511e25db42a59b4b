/*
 *  fixed-rooms.ts — Hand-authored rooms stamped onto the floor in place of a
 *  generated layout
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { FloorGrid, Pos, SpawnRecord } from "../types/types.js";
import { EntityKind, ItemPlacement } from "../types/enums.js";
import { TileFlag } from "../types/flags.js";
import { floorFromText } from "../grid/floor-text.js";
import { flagHallwayJunctions } from "./junctions.js";
import { spawnFlagForKind } from "./spawns.js";

// =============================================================================
// Data & loading
// =============================================================================

export interface FixedRoomData {
    /** ASCII rows in the floor-text format. */
    tiles: readonly string[];
    /** Spawns with positions relative to the room's top-left tile. */
    spawns: readonly SpawnRecord[];
}

/** Source of fixed rooms. Returns null for an unknown id. */
export interface FixedRoomLoader {
    load(id: number): FixedRoomData | null;
}

export function createFixedRoomCatalog(
    entries: Iterable<readonly [number, FixedRoomData]>,
): FixedRoomLoader {
    const rooms = new Map<number, FixedRoomData>(entries);
    return {
        load: (id) => rooms.get(id) ?? null,
    };
}

const FixedRoomSpawnSchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("stairs"), x: z.number().int().min(0), y: z.number().int().min(0) }),
    z.object({ kind: z.literal("player"), x: z.number().int().min(0), y: z.number().int().min(0) }),
    z.object({
        kind: z.literal("item"), x: z.number().int().min(0), y: z.number().int().min(0),
        id: z.number().int().min(0).nullable().default(null),
    }),
    z.object({
        kind: z.literal("trap"), x: z.number().int().min(0), y: z.number().int().min(0),
        id: z.number().int().min(0).nullable().default(null),
    }),
    z.object({
        kind: z.literal("enemy"), x: z.number().int().min(0), y: z.number().int().min(0),
        id: z.number().int().min(0).nullable().default(null),
    }),
]);

const FixedRoomCatalogSchema = z.array(
    z.object({
        id: z.number().int().min(1).max(0xFF),
        tiles: z.array(z.string().min(1)).min(1)
            .refine((rows) => rows.every((row) => row.length === rows[0].length), {
                message: "Fixed room rows must share one length",
            }),
        spawns: z.array(FixedRoomSpawnSchema).default([]),
    }),
);

function toSpawnRecord(spawn: z.output<typeof FixedRoomSpawnSchema>): SpawnRecord {
    const pos = { x: spawn.x, y: spawn.y };
    switch (spawn.kind) {
        case "stairs":
            return { kind: EntityKind.Stairs, pos };
        case "player":
            return { kind: EntityKind.Player, pos };
        case "item":
            return { kind: EntityKind.Item, pos, itemId: spawn.id, placement: ItemPlacement.Room };
        case "trap":
            return { kind: EntityKind.Trap, pos, trapId: spawn.id };
        case "enemy":
            return { kind: EntityKind.Enemy, pos, enemyId: spawn.id, inMonsterHouse: false };
    }
}

/** Validate a fixed-room catalog in its JSON shape. Throws a ZodError on bad data. */
export function parseFixedRoomCatalog(json: unknown): FixedRoomLoader {
    const entries = FixedRoomCatalogSchema.parse(json);
    return createFixedRoomCatalog(entries.map((entry) => [
        entry.id,
        { tiles: entry.tiles, spawns: entry.spawns.map(toSpawnRecord) },
    ] as const));
}

/** The fixed rooms shipped in data/fixed-rooms.json. */
export function loadBundledFixedRooms(): FixedRoomLoader {
    const url = new URL("../../data/fixed-rooms.json", import.meta.url);
    const json: unknown = JSON.parse(readFileSync(url, "utf8"));
    return parseFixedRoomCatalog(json);
}

// =============================================================================
// Stamping
// =============================================================================

export interface FixedRoomPlacement {
    /** Floor position of the room's top-left tile. */
    origin: Pos;
    /** Embedded spawns, in floor coordinates. */
    spawns: SpawnRecord[];
}

/**
 * Stamp a fixed room centered on the floor, flag junctions around it and
 * place its embedded spawns. Returns null when the room does not fit inside
 * the floor's border.
 */
export function generateFixedRoom(floor: FloorGrid, data: FixedRoomData): FixedRoomPlacement | null {
    const room = floorFromText(data.tiles);
    if (room.width > floor.width - 2 || room.height > floor.height - 2) {
        return null;
    }
    const ox = Math.floor((floor.width - room.width) / 2);
    const oy = Math.floor((floor.height - room.height) / 2);

    for (let x = 0; x < room.width; x++) {
        for (let y = 0; y < room.height; y++) {
            const src = room.tiles[x][y];
            const dst = floor.tiles[ox + x][oy + y];
            dst.terrain = src.terrain;
            dst.roomIndex = src.roomIndex;
            dst.flags |= src.flags;
        }
    }
    flagHallwayJunctions(floor, ox - 1, oy - 1, ox + room.width + 1, oy + room.height + 1);

    const spawns: SpawnRecord[] = [];
    for (const spawn of data.spawns) {
        if (spawn.pos.x < 0 || spawn.pos.y < 0 || spawn.pos.x >= room.width || spawn.pos.y >= room.height) {
            continue;
        }
        const pos = { x: ox + spawn.pos.x, y: oy + spawn.pos.y };
        const tile = floor.tiles[pos.x][pos.y];
        tile.spawnFlags |= spawnFlagForKind(spawn.kind);
        if (spawn.kind === EntityKind.Stairs) {
            tile.flags |= TileFlag.STAIRS;
        }
        spawns.push({ ...spawn, pos });
    }
    return { origin: { x: ox, y: oy }, spawns };
}
