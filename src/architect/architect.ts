/*
 *  architect.ts — Top-level floor generation
 *  floor-architect
 *
 *  Drives the generation phases as an explicit state machine:
 *
 *    ResetFloor → LayoutSelected → (FixedRoomLoaded → Done)
 *               | GridBuilt → HallwaysCarved → JunctionsResolved
 *               → FeaturesApplied → ReachabilityChecked
 *               → Accepted | Retry | Fallback → EntitiesPlaced → Done
 *
 *  Retry re-enters ResetFloor with the same properties until the attempt cap
 *  is reached; Fallback then builds the one-room Monster House, which needs
 *  neither features nor a reachability check.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { DungeonGrid, FloorGrid, FloorProperties, Pos, SpawnRecord } from "../types/types.js";
import { FloorLayout, GenerationFailure, GenerationState } from "../types/enums.js";
import { MAX_GENERATION_ATTEMPTS } from "../types/constants.js";
import { FloorFeature } from "../types/flags.js";
import {
    allocFloor, convertSecondaryTerrainToChasms, convertWallsToChasms, ensureImpassableTilesAreWalls,
    resetFloor, resetInnerBoundaryTileRows,
} from "../grid/floor.js";
import { type RandomSource, randPercent } from "../math/rng.js";
import { createGridCellConnections } from "./hallways.js";
import { finalizeJunctions } from "./junctions.js";
import {
    generateExtraHallways, generateKecleonShop, generateMazeRoom, generateMonsterHouse,
    generateRoomImperfections, generateSecondaryStructures,
} from "./features.js";
import { generateSecondaryTerrainFormations } from "./lakes.js";
import { stairsAlwaysReachable } from "./analysis.js";
import {
    type SpawnContext, resolveInvalidSpawns, spawnEnemies, spawnNonEnemies, spawnStairs, survivingSpawns,
} from "./spawns.js";
import { generateLayout, generateOneRoomMonsterHouseLayout } from "./layouts.js";
import { type FixedRoomLoader, type FixedRoomPlacement, generateFixedRoom } from "./fixed-rooms.js";

const LOG_TAG = "[floor-architect]";

// =============================================================================
// Context & result
// =============================================================================

export type ArchitectLogger = Pick<Console, "debug" | "warn" | "error">;

/**
 * Everything one generation run needs. The random source is consumed by the
 * run; replaying the same stream with the same properties reproduces the
 * floor exactly.
 */
export interface ArchitectContext {
    rng: RandomSource;
    properties: FloorProperties;
    /** Consulted when the properties name a fixed room. */
    fixedRoomLoader?: FixedRoomLoader;
    /** Defaults to console. */
    logger?: ArchitectLogger;
    /** Standard attempts before falling back. Defaults to MAX_GENERATION_ATTEMPTS. */
    maxAttempts?: number;
    /** Accept or reject a built floor. Defaults to stairsAlwaysReachable. */
    checkReachability?: (floor: FloorGrid, stairs: Pos) => boolean;
}

export interface GenerationResult {
    floor: FloorGrid;
    /** Surviving spawns in placement order. */
    spawns: SpawnRecord[];
    /** Every state entered, in order. */
    trace: GenerationState[];
    /** Standard generation attempts made. */
    attempts: number;
    failures: GenerationFailure[];
    /** Reports of mandatory entities that could not be placed. */
    diagnostics: string[];
    /** Layout actually built; OneRoomMonsterHouse after a fallback. */
    layout: FloorLayout;
    /** Null for fixed-room floors. */
    grid: DungeonGrid | null;
    usedFallback: boolean;
    fixedRoom: boolean;
    emptyMonsterHouse: boolean;
}

/** The fallback layout failed to produce a playable floor. */
export class FloorInvariantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "FloorInvariantError";
    }
}

// =============================================================================
// Features
// =============================================================================

/**
 * Apply the floor's features in order: maze room, secondary terrain,
 * secondary structures, room imperfections, extra hallways, Kecleon shop and
 * Monster House, then the chasm conversions the properties ask for. Returns
 * whether the Monster House is to be left empty.
 */
export function applyFeatures(
    rng: RandomSource,
    floor: FloorGrid,
    grid: DungeonGrid,
    properties: FloorProperties,
): boolean {
    const secondaryTerrain = (properties.features & FloorFeature.SECONDARY_TERRAIN) !== 0;

    generateMazeRoom(rng, floor, grid, properties.mazeRoomChance, secondaryTerrain);
    generateSecondaryTerrainFormations(rng, floor, properties);
    if (properties.features & FloorFeature.SECONDARY_STRUCTURES) {
        generateSecondaryStructures(rng, floor, grid);
    }
    if (properties.features & FloorFeature.IMPERFECT_ROOMS) {
        generateRoomImperfections(rng, floor, grid);
    }
    generateExtraHallways(rng, floor, grid, properties.extraHallwayDensity);
    generateKecleonShop(rng, floor, grid, properties.kecleonShopChance);
    generateMonsterHouse(rng, floor, grid, properties.monsterHouseChance);

    ensureImpassableTilesAreWalls(floor);
    if (properties.secondaryTerrainAsChasm) {
        convertSecondaryTerrainToChasms(floor);
    }
    if (properties.wallsAsChasm) {
        // Keep a wall band along the top and bottom edges
        convertWallsToChasms(floor);
        resetInnerBoundaryTileRows(floor);
    }

    const hasMonsterHouse = grid.cells.some((column) => column.some((cell) => cell.isMonsterHouse));
    return hasMonsterHouse
        && properties.emptyMonsterHouseChance > 0
        && randPercent(rng, properties.emptyMonsterHouseChance);
}

// =============================================================================
// State machine
// =============================================================================

/**
 * Generate one floor. Never throws for an unlucky layout: failed attempts
 * are retried and then replaced by the fallback floor. Throws
 * FloorInvariantError only if the fallback itself is unplayable.
 */
export function generateFloor(ctx: ArchitectContext): GenerationResult {
    const { rng, properties } = ctx;
    const logger = ctx.logger ?? console;
    const maxAttempts = Math.max(1, ctx.maxAttempts ?? MAX_GENERATION_ATTEMPTS);
    const checkReachability = ctx.checkReachability ?? ((floor: FloorGrid, stairs: Pos) => stairsAlwaysReachable(floor, stairs));

    const floor = allocFloor(properties.width, properties.height);
    const trace: GenerationState[] = [];
    const failures: GenerationFailure[] = [];
    let spawnCtx: SpawnContext = { rng, floor, properties, records: [], diagnostics: [] };
    let grid: DungeonGrid | null = null;
    let fixedRoom: FixedRoomPlacement | null = null;
    let fixedRoomMissing = false;
    let attempts = 0;
    let emptyMonsterHouse = false;
    let usedFallback = false;
    let spawns: SpawnRecord[] = [];

    let state: GenerationState = GenerationState.ResetFloor;
    while (state !== GenerationState.Done) {
        trace.push(state);
        switch (state) {
            case GenerationState.ResetFloor:
                resetFloor(floor);
                spawnCtx = { rng, floor, properties, records: [], diagnostics: [] };
                grid = null;
                emptyMonsterHouse = false;
                attempts++;
                state = GenerationState.LayoutSelected;
                break;

            case GenerationState.LayoutSelected:
                if (properties.fixedRoomId !== 0 && !fixedRoomMissing) {
                    const data = ctx.fixedRoomLoader?.load(properties.fixedRoomId) ?? null;
                    fixedRoom = data ? generateFixedRoom(floor, data) : null;
                    if (fixedRoom) {
                        state = GenerationState.FixedRoomLoaded;
                        break;
                    }
                    logger.warn(`${LOG_TAG} Fixed room ${properties.fixedRoomId} not found; generating a standard floor`);
                    failures.push(GenerationFailure.FixedRoomNotFound);
                    fixedRoomMissing = true;
                    resetFloor(floor);
                }
                state = GenerationState.GridBuilt;
                break;

            case GenerationState.FixedRoomLoaded:
                ensureImpassableTilesAreWalls(floor);
                spawns = fixedRoom ? fixedRoom.spawns : [];
                state = GenerationState.Done;
                break;

            case GenerationState.GridBuilt:
                grid = generateLayout(rng, floor, properties);
                spawnCtx.grid = grid;
                state = GenerationState.HallwaysCarved;
                break;

            case GenerationState.HallwaysCarved:
                if (grid) {
                    createGridCellConnections(rng, floor, grid);
                }
                state = GenerationState.JunctionsResolved;
                break;

            case GenerationState.JunctionsResolved:
                finalizeJunctions(floor);
                state = GenerationState.FeaturesApplied;
                break;

            case GenerationState.FeaturesApplied:
                emptyMonsterHouse = grid ? applyFeatures(rng, floor, grid, properties) : false;
                state = GenerationState.ReachabilityChecked;
                break;

            case GenerationState.ReachabilityChecked: {
                const stairs = spawnStairs(spawnCtx);
                if (stairs && checkReachability(floor, stairs)) {
                    state = GenerationState.Accepted;
                    break;
                }
                failures.push(GenerationFailure.StructuralFailure);
                if (attempts < maxAttempts) {
                    state = GenerationState.Retry;
                } else {
                    failures.push(GenerationFailure.AttemptsExhausted);
                    state = GenerationState.Fallback;
                }
                break;
            }

            case GenerationState.Retry:
                logger.debug(`${LOG_TAG} Attempt ${attempts} produced an unreachable floor; retrying`);
                state = GenerationState.ResetFloor;
                break;

            case GenerationState.Accepted:
                state = GenerationState.EntitiesPlaced;
                break;

            case GenerationState.Fallback: {
                logger.warn(`${LOG_TAG} No valid floor after ${attempts} attempts; using the one-room Monster House`);
                usedFallback = true;
                resetFloor(floor);
                spawnCtx = { rng, floor, properties, records: [], diagnostics: [] };
                grid = generateOneRoomMonsterHouseLayout(rng, floor, properties);
                spawnCtx.grid = grid;
                finalizeJunctions(floor);
                emptyMonsterHouse = false;
                const stairs = spawnStairs(spawnCtx);
                if (!stairs || !stairsAlwaysReachable(floor, stairs)) {
                    throw new FloorInvariantError(
                        `Fallback floor of ${floor.width}x${floor.height} tiles is not playable`,
                    );
                }
                state = GenerationState.EntitiesPlaced;
                break;
            }

            case GenerationState.EntitiesPlaced:
                spawnNonEnemies(spawnCtx, emptyMonsterHouse);
                spawnEnemies(spawnCtx, emptyMonsterHouse);
                resolveInvalidSpawns(floor);
                spawns = survivingSpawns(floor, spawnCtx.records);
                for (const message of spawnCtx.diagnostics) {
                    logger.error(`${LOG_TAG} ${message}`);
                }
                state = GenerationState.Done;
                break;

            default:
                state = GenerationState.Done;
                break;
        }
    }
    trace.push(GenerationState.Done);

    return {
        floor,
        spawns,
        trace,
        attempts,
        failures,
        diagnostics: spawnCtx.diagnostics,
        layout: usedFallback ? FloorLayout.OneRoomMonsterHouse : properties.layout,
        grid,
        usedFallback,
        fixedRoom: fixedRoom !== null,
        emptyMonsterHouse,
    };
}
