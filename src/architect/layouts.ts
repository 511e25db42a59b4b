/*
 *  layouts.ts — Macro layouts: how a floor's grid is shaped, which cells
 *  hold rooms, and which cells connect
 *  floor-architect
 *
 *  Every layout stamps its rooms and anchors and decides which cells connect.
 *  The returned grid is carved into hallways afterwards and later phases tag
 *  its rooms with features.
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

import type { DungeonGrid, FloorGrid, FloorProperties } from "../types/types.js";
import { CellRole, Direction, FloorLayout } from "../types/enums.js";
import { MIN_GRID_CELL_HEIGHT, MIN_GRID_CELL_WIDTH } from "../types/constants.js";
import { type RandomSource, clamp, randInt, randRange } from "../math/rng.js";
import {
    assignRandomGridCellConnections, assignRooms, createRoom, createRoomsAndAnchors,
    ensureConnectedGrid, getGridPositions, initDungeonGrid, mergeRoomsVertically,
} from "./grid-layout.js";
import { flagMonsterHouse } from "./features.js";
import { connectCells, forEachCell } from "./helpers.js";

export type LayoutGenerator = (rng: RandomSource, floor: FloorGrid, properties: FloorProperties) => DungeonGrid;

function maxCols(extent: number): number {
    return Math.max(1, Math.floor(extent / MIN_GRID_CELL_WIDTH));
}

function maxRows(extent: number): number {
    return Math.max(1, Math.floor(extent / MIN_GRID_CELL_HEIGHT));
}

function setRoles(grid: DungeonGrid, role: (x: number, y: number) => CellRole | null): void {
    forEachCell(grid, (cell, x, y) => {
        const r = role(x, y);
        if (r === null) {
            cell.invalid = true;
        } else {
            cell.role = r;
        }
    });
}

// =============================================================================
// Standard layouts
// =============================================================================

interface StandardShape {
    /** Share of the floor width the grid covers, in quarters. */
    widthQuarters: number;
    cols: [number, number];
    rows: [number, number];
}

const STANDARD_SHAPES = {
    large: { widthQuarters: 4, cols: [2, 5], rows: [2, 3] },
    medium: { widthQuarters: 3, cols: [2, 3], rows: [2, 3] },
    small: { widthQuarters: 2, cols: [2, 2], rows: [2, 3] },
} satisfies Record<string, StandardShape>;

/**
 * Random rooms and anchors over a grid, joined by a random walk and
 * patched up by ensureConnectedGrid. Narrower shapes are centered.
 */
function standardLayout(shape: StandardShape): LayoutGenerator {
    return (rng, floor, properties) => {
        const extent = Math.floor(floor.width * shape.widthQuarters / 4);
        const offset = Math.floor((floor.width - extent) / 2);
        const requested = properties.gridSize ?? {
            cols: randRange(rng, shape.cols[0], shape.cols[1]),
            rows: randRange(rng, shape.rows[0], shape.rows[1]),
        };
        const cols = clamp(requested.cols, 1, maxCols(extent));
        const rows = clamp(requested.rows, 1, maxRows(floor.height));

        const grid = initDungeonGrid(getGridPositions(extent, cols, offset), getGridPositions(floor.height, rows));
        assignRooms(rng, grid, properties.roomDensity);
        createRoomsAndAnchors(rng, floor, grid);
        const walkStart = assignRandomGridCellConnections(rng, grid, properties.floorConnectivity);
        if (walkStart) {
            ensureConnectedGrid(rng, floor, grid, walkStart, properties.allowDeadEnds);
        }
        return grid;
    };
}

// =============================================================================
// Fixed-shape layouts
// =============================================================================

/** A 4 × 2 block of rooms inside a ring of hallway anchors. */
export const generateOuterRingLayout: LayoutGenerator = (rng, floor, properties) => {
    const xs = [0, ...getGridPositions(floor.width - 12, 4, 6), floor.width];
    const ys = [0, ...getGridPositions(floor.height - 10, 2, 5), floor.height];
    const grid = initDungeonGrid(xs, ys);
    const onRing = (x: number, y: number) => x === 0 || y === 0 || x === grid.cols - 1 || y === grid.rows - 1;

    setRoles(grid, (x, y) => (onRing(x, y) ? CellRole.Anchor : CellRole.Room));
    createRoomsAndAnchors(rng, floor, grid);

    forEachCell(grid, (_cell, x, y) => {
        if (x + 1 < grid.cols && (onRing(x, y) === onRing(x + 1, y) ? y === 0 || y === grid.rows - 1 : true)) {
            connectCells(grid, x, y, Direction.Right);
        }
        if (y + 1 < grid.rows && (onRing(x, y) === onRing(x, y + 1) ? x === 0 || x === grid.cols - 1 : true)) {
            connectCells(grid, x, y, Direction.Down);
        }
    });
    assignRandomGridCellConnections(rng, grid, properties.floorConnectivity);
    return grid;
};

/**
 * A mesh of anchors on the interior 3 × 2 cells, with a room sticking out
 * from it on every border cell except the corners.
 */
export const generateCrossroadsLayout: LayoutGenerator = (rng, floor) => {
    const grid = initDungeonGrid(getGridPositions(floor.width, 5), getGridPositions(floor.height, 4));
    const corner = (x: number, y: number) => (x === 0 || x === 4) && (y === 0 || y === 3);
    const interior = (x: number, y: number) => x >= 1 && x <= 3 && y >= 1 && y <= 2;

    setRoles(grid, (x, y) => {
        if (corner(x, y)) return null;
        return interior(x, y) ? CellRole.Anchor : CellRole.Room;
    });
    createRoomsAndAnchors(rng, floor, grid);

    forEachCell(grid, (cell, x, y) => {
        if (cell.invalid) {
            return;
        }
        if (x + 1 < grid.cols && (interior(x, y) || interior(x + 1, y))) {
            connectCells(grid, x, y, Direction.Right);
        }
        if (y + 1 < grid.rows && (interior(x, y) || interior(x, y + 1))) {
            connectCells(grid, x, y, Direction.Down);
        }
    });
    return grid;
};

/** Five cells in a row, each joined to the next. */
export const generateLineLayout: LayoutGenerator = (rng, floor, properties) => {
    const grid = initDungeonGrid(getGridPositions(floor.width, 5), [0, floor.height]);
    assignRooms(rng, grid, properties.roomDensity);
    createRoomsAndAnchors(rng, floor, grid);
    for (let x = 0; x + 1 < grid.cols; x++) {
        connectCells(grid, x, 0, Direction.Right);
    }
    return grid;
};

/** Five rooms in a plus sign, the arms joined to the center. */
export const generateCrossLayout: LayoutGenerator = (rng, floor) => {
    const grid = initDungeonGrid(getGridPositions(floor.width, 3), getGridPositions(floor.height, 3));
    setRoles(grid, (x, y) => (x === 1 || y === 1 ? CellRole.Room : null));
    createRoomsAndAnchors(rng, floor, grid);
    connectCells(grid, 1, 1, Direction.Up);
    connectCells(grid, 1, 1, Direction.Down);
    connectCells(grid, 1, 1, Direction.Left);
    connectCells(grid, 1, 1, Direction.Right);
    return grid;
};

/** A 3 × 3 block of rooms joined along each row, its central column merged. */
export const generateBeetleLayout: LayoutGenerator = (rng, floor) => {
    const grid = initDungeonGrid(getGridPositions(floor.width, 3), getGridPositions(floor.height, 3));
    setRoles(grid, () => CellRole.Room);
    createRoomsAndAnchors(rng, floor, grid);
    mergeRoomsVertically(floor, grid, 1, 0, 3);
    for (let y = 0; y < grid.rows; y++) {
        connectCells(grid, 0, y, Direction.Right);
        connectCells(grid, 1, y, Direction.Right);
    }
    return grid;
};

/** Rooms on every border cell, joined around the ring; the interior stays empty. */
export const generateOuterRoomsLayout: LayoutGenerator = (rng, floor, properties) => {
    const requested = properties.gridSize ?? { cols: randRange(rng, 3, 5), rows: randRange(rng, 2, 3) };
    const cols = clamp(requested.cols, 1, maxCols(floor.width));
    const rows = clamp(requested.rows, 1, maxRows(floor.height));
    const grid = initDungeonGrid(getGridPositions(floor.width, cols), getGridPositions(floor.height, rows));
    const topOrBottom = (y: number) => y === 0 || y === rows - 1;
    const leftOrRight = (x: number) => x === 0 || x === cols - 1;

    setRoles(grid, (x, y) => (topOrBottom(y) || leftOrRight(x) ? CellRole.Room : null));
    createRoomsAndAnchors(rng, floor, grid);
    forEachCell(grid, (cell, x, y) => {
        if (cell.invalid) {
            return;
        }
        if (x + 1 < cols && topOrBottom(y)) {
            connectCells(grid, x, y, Direction.Right);
        }
        if (y + 1 < rows && leftOrRight(x)) {
            connectCells(grid, x, y, Direction.Down);
        }
    });
    return grid;
};

/** One room covering the floor inside a two-tile margin, tagged as a Monster House. */
export const generateOneRoomMonsterHouseLayout: LayoutGenerator = (_rng, floor) => {
    const grid = initDungeonGrid([0, floor.width], [0, floor.height]);
    const cell = grid.cells[0][0];
    createRoom(floor, cell, { startX: 2, startY: 2, endX: floor.width - 2, endY: floor.height - 2 }, 0);
    cell.isMonsterHouse = true;
    flagMonsterHouse(floor, cell.roomIndex);
    return grid;
};

/** Two joined rooms, left and right; one of them is a Monster House. */
export const generateTwoRoomsWithMonsterHouseLayout: LayoutGenerator = (rng, floor) => {
    const grid = initDungeonGrid(getGridPositions(floor.width, 2), [0, floor.height]);
    setRoles(grid, () => CellRole.Room);
    createRoomsAndAnchors(rng, floor, grid);
    connectCells(grid, 0, 0, Direction.Right);

    const house = grid.cells[randInt(rng, 2)][0];
    house.isMonsterHouse = true;
    flagMonsterHouse(floor, house.roomIndex);
    return grid;
};

// =============================================================================
// Dispatch
// =============================================================================

export const LAYOUT_GENERATORS: Readonly<Record<FloorLayout, LayoutGenerator>> = Object.freeze({
    [FloorLayout.Large]: standardLayout(STANDARD_SHAPES.large),
    [FloorLayout.Small]: standardLayout(STANDARD_SHAPES.small),
    [FloorLayout.OneRoomMonsterHouse]: generateOneRoomMonsterHouseLayout,
    [FloorLayout.OuterRing]: generateOuterRingLayout,
    [FloorLayout.Crossroads]: generateCrossroadsLayout,
    [FloorLayout.TwoRoomsWithMonsterHouse]: generateTwoRoomsWithMonsterHouseLayout,
    [FloorLayout.Line]: generateLineLayout,
    [FloorLayout.Cross]: generateCrossLayout,
    [FloorLayout.Medium]: standardLayout(STANDARD_SHAPES.medium),
    [FloorLayout.Beetle]: generateBeetleLayout,
    [FloorLayout.OuterRooms]: generateOuterRoomsLayout,
});

export function generateLayout(rng: RandomSource, floor: FloorGrid, properties: FloorProperties): DungeonGrid {
    return LAYOUT_GENERATORS[properties.layout](rng, floor, properties);
}
