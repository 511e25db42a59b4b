/*
 *  lakes.ts — Secondary terrain formations: rivers and lakes
 *  floor-architect
 *
 *  Rivers walk from the top or bottom edge towards the opposite one in
 *  straight runs joined by sideways meanders. Lakes are blobs grown from a
 *  center point and smoothed with one cellular automaton round. Every tile
 *  goes through setSecondaryTerrainOnWall, so formations pass through rooms
 *  and hallways without changing them and never touch impassable walls.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { FloorGrid, FloorProperties } from "../types/types.js";
import { Terrain } from "../types/enums.js";
import {
    LAKE_RADIUS_MAX, LAKE_RADIUS_MIN, RIVER_LAKE_CHANCE, RIVER_RUN_MAX, RIVER_RUN_MIN,
} from "../types/constants.js";
import { FloorFeature } from "../types/flags.js";
import { nbDirs } from "../globals/tables.js";
import { allocGrid, cellularAutomataRound } from "../grid/grid.js";
import { setSecondaryTerrainOnWall, tileAt } from "../grid/floor.js";
import { type RandomSource, randInt, randPercent, randRange } from "../math/rng.js";

// =============================================================================
// Lakes
// =============================================================================

/**
 * Grow a lake around (centerX, centerY). Returns the number of tiles that
 * became secondary terrain.
 */
export function generateLake(rng: RandomSource, floor: FloorGrid, centerX: number, centerY: number): number {
    const radius = randRange(rng, LAKE_RADIUS_MIN, LAKE_RADIUS_MAX);
    const size = radius * 2 + 1;
    const blob = allocGrid(size, size);
    blob[radius][radius] = 1;

    // Accrete tiles next to the blob
    for (let i = 0; i < size * size * 2; i++) {
        const x = randInt(rng, size);
        const y = randInt(rng, size);
        if (blob[x][y]) {
            continue;
        }
        for (let dir = 0; dir < 4; dir++) {
            const nx = x + nbDirs[dir][0];
            const ny = y + nbDirs[dir][1];
            if (nx >= 0 && nx < size && ny >= 0 && ny < size && blob[nx][ny]) {
                blob[x][y] = 1;
                break;
            }
        }
    }
    cellularAutomataRound(blob, "ffffftttt", "ffftttttt");

    let converted = 0;
    for (let x = 0; x < size; x++) {
        for (let y = 0; y < size; y++) {
            const tile = blob[x][y] ? tileAt(floor, centerX - radius + x, centerY - radius + y) : null;
            if (tile && setSecondaryTerrainOnWall(tile)) {
                converted++;
            }
        }
    }
    return converted;
}

// =============================================================================
// Rivers
// =============================================================================

function insideBorder(floor: FloorGrid, x: number, y: number): boolean {
    return x > 0 && x < floor.width - 1 && y > 0 && y < floor.height - 1;
}

/**
 * Walk a river from one horizontal edge towards the other. The walk stops on
 * existing secondary terrain or at the border, and sometimes ends early in a
 * lake. Returns the number of tiles converted.
 */
export function generateRiver(rng: RandomSource, floor: FloorGrid): number {
    const topDown = randInt(rng, 2) === 0;
    const dy = topDown ? 1 : -1;
    let x = randRange(rng, 2, floor.width - 3);
    let y = topDown ? 1 : floor.height - 2;
    let converted = 0;

    for (;;) {
        const run = randRange(rng, RIVER_RUN_MIN, RIVER_RUN_MAX);
        for (let i = 0; i < run; i++) {
            const tile = insideBorder(floor, x, y) ? tileAt(floor, x, y) : null;
            if (!tile || tile.terrain === Terrain.Secondary) {
                return converted;
            }
            if (setSecondaryTerrainOnWall(tile)) {
                converted++;
            }
            y += dy;
        }

        // Meander sideways along the last row laid
        const row = y - dy;
        const dx = randInt(rng, 2) === 0 ? -1 : 1;
        const meander = randRange(rng, RIVER_RUN_MIN, RIVER_RUN_MAX);
        for (let i = 0; i < meander; i++) {
            x += dx;
            const tile = insideBorder(floor, x, row) ? tileAt(floor, x, row) : null;
            if (!tile || tile.terrain === Terrain.Secondary) {
                return converted;
            }
            if (setSecondaryTerrainOnWall(tile)) {
                converted++;
            }
        }

        if (randPercent(rng, RIVER_LAKE_CHANCE)) {
            return converted + generateLake(rng, floor, x, row);
        }
    }
}

// =============================================================================
// Formations
// =============================================================================

/**
 * Lay rivers and standalone lakes when the floor enables secondary terrain.
 * One formation per point of secondary terrain density; a third of them are
 * standalone lakes. Returns the number of tiles converted.
 */
export function generateSecondaryTerrainFormations(
    rng: RandomSource,
    floor: FloorGrid,
    properties: Pick<FloorProperties, "features" | "secondaryTerrainDensity">,
): number {
    if (!(properties.features & FloorFeature.SECONDARY_TERRAIN)) {
        return 0;
    }
    let converted = 0;
    for (let i = 0; i < properties.secondaryTerrainDensity; i++) {
        if (randInt(rng, 3) === 0) {
            const x = randRange(rng, 2, floor.width - 3);
            const y = randRange(rng, 2, floor.height - 3);
            converted += generateLake(rng, floor, x, y);
        } else {
            converted += generateRiver(rng, floor);
        }
    }
    return converted;
}
