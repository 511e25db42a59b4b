/*
 *  floor-properties.ts — Schema, defaults and parsing for the per-floor
 *  configuration consumed by the generator
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import { z } from "zod";
import { FloorLayout, HiddenStairsType } from "../types/enums.js";
import {
    DEFAULT_FLOOR_WIDTH, DEFAULT_FLOOR_HEIGHT,
    MIN_FLOOR_WIDTH, MAX_FLOOR_WIDTH, MIN_FLOOR_HEIGHT, MAX_FLOOR_HEIGHT,
    MAX_GRID_COLS, MAX_GRID_ROWS, MIN_GRID_CELL_WIDTH, MIN_GRID_CELL_HEIGHT, LAYOUT_MIN_FLOOR_SIZE,
} from "../types/constants.js";
import { ALL_FLOOR_FEATURES } from "../types/flags.js";

const PercentSchema = z
    .number()
    .int("Chances must be integers")
    .min(0, { message: "Chances must be at least 0" })
    .max(100, { message: "Chances cannot exceed 100" });

const DensitySchema = z.number().int("Densities must be integers").min(0).max(100);

const WeightedTableSchema = z.array(
    z.object({
        id: z.number().int().min(0),
        weight: z.number().int().min(0),
    }),
);

const GridSizeSchema = z.object({
    cols: z.number().int().min(1).max(MAX_GRID_COLS),
    rows: z.number().int().min(1).max(MAX_GRID_ROWS),
});

export const FloorPropertiesSchema = z
    .object({
        width: z.number().int("Width must be an integer").min(MIN_FLOOR_WIDTH).max(MAX_FLOOR_WIDTH)
            .default(DEFAULT_FLOOR_WIDTH),
        height: z.number().int("Height must be an integer").min(MIN_FLOOR_HEIGHT).max(MAX_FLOOR_HEIGHT)
            .default(DEFAULT_FLOOR_HEIGHT),
        layout: z.nativeEnum(FloorLayout).default(FloorLayout.Large),
        /** Overrides the randomized grid size of standard and outer-rooms layouts. */
        gridSize: GridSizeSchema.nullable().default(null),
        /** Negative: exactly |n| rooms. Positive: n plus up to two more. */
        roomDensity: z.number().int().min(-24).max(24)
            .refine((n) => n !== 0, { message: "Room density cannot be 0" })
            .default(6),
        floorConnectivity: z.number().int().min(1).max(64).default(15),
        allowDeadEnds: z.boolean().default(false),
        /** FloorFeature bits. */
        features: z.number().int().min(0)
            .refine((bits) => (bits & ~ALL_FLOOR_FEATURES) === 0, { message: "Unknown feature bits" })
            .default(0),
        secondaryTerrainDensity: z.number().int().min(0).max(10).default(2),
        secondaryTerrainAsChasm: z.boolean().default(false),
        wallsAsChasm: z.boolean().default(false),
        mazeRoomChance: PercentSchema.default(0),
        kecleonShopChance: PercentSchema.default(0),
        monsterHouseChance: PercentSchema.default(0),
        emptyMonsterHouseChance: PercentSchema.default(0),
        extraHallwayDensity: DensitySchema.default(0),
        itemDensity: DensitySchema.default(5),
        buriedItemDensity: DensitySchema.default(0),
        trapDensity: DensitySchema.default(3),
        /** Negative: exactly |n| enemies. */
        enemyDensity: z.number().int().min(-100).max(100).default(4),
        itemTable: WeightedTableSchema.default([]),
        trapTable: WeightedTableSchema.default([]),
        enemyTable: WeightedTableSchema.default([]),
        /** 0 means the floor has no fixed room. */
        fixedRoomId: z.number().int().min(0).max(0xFF).default(0),
        hiddenStairsType: z.nativeEnum(HiddenStairsType).default(HiddenStairsType.None),
        floorsRemaining: z.number().int().min(0).default(10),
        rescueFloor: z.boolean().default(false),
    })
    .superRefine((data, ctx) => {
        const min = LAYOUT_MIN_FLOOR_SIZE[data.layout];
        if (data.width < min.width || data.height < min.height) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Layout ${FloorLayout[data.layout]} needs a floor of at least ${min.width}x${min.height}`,
                path: ["layout"],
            });
        }
        if (data.gridSize === null) {
            return;
        }
        if (Math.floor(data.width / data.gridSize.cols) < MIN_GRID_CELL_WIDTH) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "Grid columns leave cells narrower than the minimum cell width",
                path: ["gridSize", "cols"],
            });
        }
        if (Math.floor(data.height / data.gridSize.rows) < MIN_GRID_CELL_HEIGHT) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "Grid rows leave cells shorter than the minimum cell height",
                path: ["gridSize", "rows"],
            });
        }
    });

export type FloorPropertiesInput = z.input<typeof FloorPropertiesSchema>;
export type FloorProperties = Readonly<z.output<typeof FloorPropertiesSchema>>;

export class FloorPropertiesError extends Error {
    readonly issues: readonly z.ZodIssue[];

    constructor(error: z.ZodError) {
        super(`Invalid floor properties: ${error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")}`);
        this.name = "FloorPropertiesError";
        this.issues = error.issues;
    }
}

export type FloorPropertiesResult =
    | { success: true; data: FloorProperties }
    | { success: false; error: FloorPropertiesError };

export function safeParseFloorProperties(input: FloorPropertiesInput = {}): FloorPropertiesResult {
    const parsed = FloorPropertiesSchema.safeParse(input);
    if (!parsed.success) {
        return { success: false, error: new FloorPropertiesError(parsed.error) };
    }
    return { success: true, data: Object.freeze(parsed.data) };
}

/** Validate input and fill in defaults. Throws FloorPropertiesError on bad input. */
export function parseFloorProperties(input: FloorPropertiesInput = {}): FloorProperties {
    const result = safeParseFloorProperties(input);
    if (!result.success) {
        throw result.error;
    }
    return result.data;
}
