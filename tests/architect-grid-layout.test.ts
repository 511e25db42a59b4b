/*
 *  architect-grid-layout.test.ts — Tests for grid partitioning, rooms,
 *  anchors and cell connections
 *  floor-architect
 */

import { describe, it, expect } from "vitest";
import {
    getGridPositions,
    initDungeonGrid,
    assignRooms,
    randomRoomRect,
    randomAnchorPos,
    createRoomsAndAnchors,
    assignRandomGridCellConnections,
    connectedComponent,
    ensureConnectedGrid,
    mergeRoomsVertically,
} from "../src/architect/grid-layout.js";
import { connectCells, forEachCell, rectHeight, rectWidth } from "../src/architect/helpers.js";
import { allocFloor } from "../src/grid/floor.js";
import { JenkinsRandom } from "../src/math/rng.js";
import { CellRole, Direction, Terrain } from "../src/types/enums.js";
import { ROOM_INDEX_ANCHOR, ROOM_INDEX_HALLWAY } from "../src/types/constants.js";
import type { DungeonGrid, FloorGrid } from "../src/types/types.js";
import { scriptedRandom } from "./test-helpers.js";

// =============================================================================
// Test helpers
// =============================================================================

function countRoles(grid: DungeonGrid, role: CellRole): number {
    let n = 0;
    forEachCell(grid, (cell) => {
        if (cell.role === role) n++;
    });
    return n;
}

/** A row of cells 12 wide and 16 tall with the given roles, stamped onto a fresh floor. */
function rowOfCells(roles: CellRole[], seed = 1): { floor: FloorGrid; grid: DungeonGrid } {
    const floor = allocFloor(roles.length * 12, 16);
    const grid = initDungeonGrid(getGridPositions(roles.length * 12, roles.length), [0, 16]);
    roles.forEach((role, x) => {
        grid.cells[x][0].role = role;
    });
    createRoomsAndAnchors(new JenkinsRandom(seed), floor, grid);
    return { floor, grid };
}

// =============================================================================
// Grid construction
// =============================================================================

describe("getGridPositions", () => {
    it("splits an extent into equal cells", () => {
        expect(getGridPositions(56, 5)).toEqual([0, 11, 22, 33, 44, 55]);
    });

    it("starts at the offset", () => {
        expect(getGridPositions(28, 2, 14)).toEqual([14, 28, 42]);
    });
});

describe("initDungeonGrid", () => {
    it("builds cols × rows unused cells", () => {
        const grid = initDungeonGrid([0, 10, 20], [0, 8, 16, 24]);
        expect(grid.cols).toBe(2);
        expect(grid.rows).toBe(3);
        expect(grid.cells[1][2].cell).toEqual({ startX: 10, startY: 16, endX: 20, endY: 24 });
        expect(grid.cells[1][2].role).toBe(CellRole.Unused);
        expect(grid.cells[1][2].roomIndex).toBe(ROOM_INDEX_HALLWAY);
    });
});

describe("assignRooms", () => {
    const boundaries = (): DungeonGrid => initDungeonGrid([0, 10, 20, 30], [0, 10, 20]);

    it("takes exactly |density| rooms for a negative density", () => {
        const grid = boundaries();
        expect(assignRooms(new JenkinsRandom(4), grid, -3)).toBe(3);
        expect(countRoles(grid, CellRole.Room)).toBe(3);
        expect(countRoles(grid, CellRole.Anchor)).toBe(3);
    });

    it("adds up to two rooms to a positive density and caps at the valid cells", () => {
        const grid = boundaries();
        expect(assignRooms(scriptedRandom([2]), grid, 6)).toBe(6);
        expect(countRoles(grid, CellRole.Room)).toBe(6);
    });

    it("keeps at least two rooms", () => {
        const grid = boundaries();
        expect(assignRooms(scriptedRandom([0]), grid, 1)).toBe(2);
        expect(countRoles(grid, CellRole.Room)).toBe(2);
    });

    it("skips invalid cells", () => {
        const grid = boundaries();
        grid.cells[0][0].invalid = true;
        expect(assignRooms(new JenkinsRandom(9), grid, -10)).toBe(5);
        expect(grid.cells[0][0].role).toBe(CellRole.Unused);
        expect(countRoles(grid, CellRole.Room)).toBe(5);
    });
});

// =============================================================================
// Rooms & anchors
// =============================================================================

describe("randomRoomRect", () => {
    const cell = { startX: 0, startY: 0, endX: 11, endY: 11 };

    it("places a room two tiles in from the cell's top-left", () => {
        // width 5, height 4 + 1, x offset 3, y offset 0
        expect(randomRoomRect(scriptedRandom([0, 1, 3, 0]), cell))
            .toEqual({ startX: 5, startY: 2, endX: 10, endY: 7 });
    });

    it("rounds even sizes up to odd ones that still fit", () => {
        // width 6 -> 7, height 4 -> 5
        expect(randomRoomRect(scriptedRandom([1, 0, 0, 0]), cell))
            .toEqual({ startX: 2, startY: 2, endX: 9, endY: 7 });
    });

    it("caps the aspect ratio at 3:2", () => {
        // width 8 (9 does not fit) against height 5 is capped to 7
        expect(randomRoomRect(scriptedRandom([3, 0, 1, 0]), cell))
            .toEqual({ startX: 3, startY: 2, endX: 10, endY: 7 });
    });
});

describe("randomAnchorPos", () => {
    it("keeps anchors away from the cell edges", () => {
        expect(randomAnchorPos(scriptedRandom([6, 0]), { startX: 0, startY: 0, endX: 11, endY: 11 }))
            .toEqual({ x: 8, y: 2 });
    });
});

describe("createRoomsAndAnchors", () => {
    it("stamps rooms inside their cells with column-major room indices", () => {
        for (let seed = 1; seed <= 8; seed++) {
            const rng = new JenkinsRandom(seed);
            const floor = allocFloor(56, 32);
            const grid = initDungeonGrid(getGridPositions(56, 4), getGridPositions(32, 3));
            assignRooms(rng, grid, 6);
            const next = createRoomsAndAnchors(rng, floor, grid);

            let expectedIndex = 0;
            forEachCell(grid, (cell) => {
                if (cell.role === CellRole.Anchor) {
                    const tile = floor.tiles[cell.room.startX][cell.room.startY];
                    expect(tile.terrain).toBe(Terrain.Normal);
                    expect(tile.roomIndex).toBe(ROOM_INDEX_ANCHOR);
                    return;
                }
                expect(cell.roomIndex).toBe(expectedIndex++);
                const { room } = cell;
                expect(room.startX).toBeGreaterThanOrEqual(cell.cell.startX + 2);
                expect(room.startY).toBeGreaterThanOrEqual(cell.cell.startY + 2);
                expect(room.endX).toBeLessThanOrEqual(cell.cell.endX - 1);
                expect(room.endY).toBeLessThanOrEqual(cell.cell.endY - 1);
                expect(rectWidth(room)).toBeLessThanOrEqual(Math.floor(rectHeight(room) * 3 / 2));
                expect(rectHeight(room)).toBeLessThanOrEqual(Math.floor(rectWidth(room) * 3 / 2));
                for (let x = room.startX; x < room.endX; x++) {
                    for (let y = room.startY; y < room.endY; y++) {
                        expect(floor.tiles[x][y].terrain).toBe(Terrain.Normal);
                        expect(floor.tiles[x][y].roomIndex).toBe(cell.roomIndex);
                    }
                }
            });
            expect(next).toBe(expectedIndex);
        }
    });
});

// =============================================================================
// Connections
// =============================================================================

describe("assignRandomGridCellConnections", () => {
    it("connects each cell the walk steps into", () => {
        const grid = initDungeonGrid([0, 10, 20, 30], [0, 10]);
        forEachCell(grid, (cell) => {
            cell.role = CellRole.Room;
        });
        // Start at the first cell, then step right twice
        const start = assignRandomGridCellConnections(scriptedRandom([0, 3, 3]), grid, 2);
        expect(start).toEqual({ x: 0, y: 0 });
        expect(grid.cells[0][0].connectedRight).toBe(true);
        expect(grid.cells[1][0].connectedLeft).toBe(true);
        expect(grid.cells[1][0].connectedRight).toBe(true);
        expect(grid.cells[2][0].connectedLeft).toBe(true);
    });

    it("turns through the directions in order when blocked", () => {
        const grid = initDungeonGrid([0, 10, 20], [0, 10, 20]);
        forEachCell(grid, (cell) => {
            cell.role = CellRole.Room;
        });
        // Up is off the grid, so Down is taken
        assignRandomGridCellConnections(scriptedRandom([0, 0]), grid, 1);
        expect(grid.cells[0][0].connectedDown).toBe(true);
        expect(grid.cells[0][0].connectedRight).toBe(false);
    });

    it("returns null when no cell is usable", () => {
        const grid = initDungeonGrid([0, 10, 20], [0, 10]);
        expect(assignRandomGridCellConnections(scriptedRandom(), grid, 5)).toBeNull();
    });
});

describe("connectedComponent", () => {
    it("follows connections only", () => {
        const grid = initDungeonGrid([0, 10, 20, 30], [0, 10]);
        connectCells(grid, 0, 0, Direction.Right);
        expect(connectedComponent(grid, 0, 0)).toEqual([[true], [true], [false]]);
    });
});

describe("ensureConnectedGrid", () => {
    it("bridges a stranded room through an anchor", () => {
        const { floor, grid } = rowOfCells([CellRole.Room, CellRole.Anchor, CellRole.Room]);
        ensureConnectedGrid(scriptedRandom(), floor, grid, { x: 0, y: 0 }, false);
        expect(grid.cells[0][0].connectedRight).toBe(true);
        expect(grid.cells[1][0].connectedRight).toBe(true);
        expect(grid.cells[1][0].role).toBe(CellRole.Anchor);
    });

    it("bridges through a chain of anchors", () => {
        const { floor, grid } = rowOfCells([CellRole.Room, CellRole.Anchor, CellRole.Anchor, CellRole.Room]);
        ensureConnectedGrid(scriptedRandom(), floor, grid, { x: 0, y: 0 }, false);
        expect(connectedComponent(grid, 0, 0)).toEqual([[true], [true], [true], [true]]);
    });

    it("removes anchors left outside the component", () => {
        const { floor, grid } = rowOfCells([CellRole.Room, CellRole.Room, CellRole.Anchor]);
        connectCells(grid, 0, 0, Direction.Right);
        const anchor = { ...grid.cells[2][0].room };

        ensureConnectedGrid(scriptedRandom(), floor, grid, { x: 0, y: 0 }, true);
        expect(grid.cells[2][0].role).toBe(CellRole.Unused);
        const tile = floor.tiles[anchor.startX][anchor.startY];
        expect(tile.terrain).toBe(Terrain.Wall);
        expect(tile.roomIndex).toBe(ROOM_INDEX_HALLWAY);
    });

    it("keeps dead-end anchors when dead ends are allowed", () => {
        const { floor, grid } = rowOfCells([CellRole.Room, CellRole.Anchor]);
        connectCells(grid, 0, 0, Direction.Right);
        ensureConnectedGrid(scriptedRandom(), floor, grid, { x: 0, y: 0 }, true);
        expect(grid.cells[1][0].role).toBe(CellRole.Anchor);
        expect(grid.cells[0][0].connectedRight).toBe(true);
    });

    it("prunes dead-end anchors otherwise", () => {
        const { floor, grid } = rowOfCells([CellRole.Room, CellRole.Anchor]);
        connectCells(grid, 0, 0, Direction.Right);
        ensureConnectedGrid(scriptedRandom(), floor, grid, { x: 1, y: 0 }, false);
        expect(grid.cells[1][0].role).toBe(CellRole.Unused);
        expect(grid.cells[0][0].connectedRight).toBe(false);
    });

    it("gives a dead-end anchor a second connection where it can", () => {
        const floor = allocFloor(24, 32);
        const grid = initDungeonGrid([0, 12, 24], [0, 16, 32]);
        grid.cells[0][0].role = CellRole.Room;
        grid.cells[1][0].role = CellRole.Room;
        grid.cells[0][1].role = CellRole.Anchor;
        grid.cells[1][1].role = CellRole.Room;
        createRoomsAndAnchors(new JenkinsRandom(3), floor, grid);
        connectCells(grid, 0, 0, Direction.Right);
        connectCells(grid, 1, 0, Direction.Down);
        connectCells(grid, 0, 0, Direction.Down);

        ensureConnectedGrid(scriptedRandom(), floor, grid, { x: 0, y: 0 }, false);
        expect(grid.cells[0][1].role).toBe(CellRole.Anchor);
        expect(grid.cells[0][1].connectedRight).toBe(true);
    });
});

describe("mergeRoomsVertically", () => {
    it("merges a column of rooms into the top room", () => {
        const floor = allocFloor(16, 30);
        const grid = initDungeonGrid([0, 16], [0, 10, 20, 30]);
        forEachCell(grid, (cell) => {
            cell.role = CellRole.Room;
        });
        createRoomsAndAnchors(new JenkinsRandom(2), floor, grid);
        connectCells(grid, 0, 0, Direction.Down);
        const rooms = grid.cells[0].map((cell) => cell.room);
        const union = {
            startX: Math.min(...rooms.map((r) => r.startX)),
            startY: rooms[0].startY,
            endX: Math.max(...rooms.map((r) => r.endX)),
            endY: rooms[2].endY,
        };

        expect(mergeRoomsVertically(floor, grid, 0, 0, 3)).toBe(true);
        for (const cell of grid.cells[0]) {
            expect(cell.isMerged).toBe(true);
            expect(cell.roomIndex).toBe(0);
            expect(cell.room).toEqual(union);
        }
        expect(grid.cells[0][0].connectedDown).toBe(false);
        for (let x = union.startX; x < union.endX; x++) {
            for (let y = union.startY; y < union.endY; y++) {
                expect(floor.tiles[x][y].terrain).toBe(Terrain.Normal);
                expect(floor.tiles[x][y].roomIndex).toBe(0);
            }
        }
    });

    it("refuses cells that are not rooms", () => {
        const { floor, grid } = rowOfCells([CellRole.Anchor]);
        expect(mergeRoomsVertically(floor, grid, 0, 0, 1)).toBe(false);
    });
});
