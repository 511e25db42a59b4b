/*
 *  architect-features.test.ts — Tests for mazes, structures, imperfections,
 *  extra hallways, shops and Monster Houses
 *  floor-architect
 */

import { describe, it, expect } from "vitest";
import {
    generateMazeLine,
    generateMaze,
    generateMazeRoom,
    generateSecondaryStructures,
    generateRoomImperfections,
    extraHallwayPath,
    generateExtraHallways,
    flagKecleonShop,
    generateKecleonShop,
    generateMonsterHouse,
} from "../src/architect/features.js";
import { createRoom, initDungeonGrid } from "../src/architect/grid-layout.js";
import { countWalkableTiles, reachableFrom } from "../src/architect/analysis.js";
import { allocFloor, fillRect, findTiles, isOpen } from "../src/grid/floor.js";
import { floorFromText, floorToText } from "../src/grid/floor-text.js";
import { JenkinsRandom } from "../src/math/rng.js";
import { Direction, Terrain } from "../src/types/enums.js";
import { ROOM_INDEX_HALLWAY } from "../src/types/constants.js";
import { TileFlag } from "../src/types/flags.js";
import type { DungeonGrid, FloorGrid, Rect } from "../src/types/types.js";
import { scriptedRandom } from "./test-helpers.js";

// =============================================================================
// Test helpers
// =============================================================================

/** A walled floor holding a single room in a single-cell grid. */
function singleRoom(width: number, height: number, room: Rect): { floor: FloorGrid; grid: DungeonGrid } {
    const floor = allocFloor(width, height);
    const grid = initDungeonGrid([0, width], [0, height]);
    createRoom(floor, grid.cells[0][0], room, 0);
    return { floor, grid };
}

function openHallway(floor: FloorGrid, x: number, y: number): void {
    floor.tiles[x][y].terrain = Terrain.Normal;
    floor.tiles[x][y].roomIndex = ROOM_INDEX_HALLWAY;
}

// =============================================================================
// Mazes
// =============================================================================

describe("generateMazeLine", () => {
    const rows = [
        "#######",
        "#.....#",
        "#.....#",
        "#.....#",
        "#.....#",
        "#.....#",
        "#######",
    ];
    const bounds = { startX: 1, startY: 1, endX: 6, endY: 6 };

    it("walks two tiles at a time onto open tiles", () => {
        const floor = floorFromText(rows);
        // Right, then Down; the remaining steps have one option each
        generateMazeLine(scriptedRandom([1, 0]), floor, 2, 2, bounds, false, 0);
        expect(floorToText(floor)).toEqual([
            "#######",
            "#.....#",
            "#.###.#",
            "#.#.#.#",
            "#.###.#",
            "#.....#",
            "#######",
        ]);
    });

    it("lays secondary terrain inside its own room", () => {
        const floor = floorFromText(rows);
        generateMazeLine(scriptedRandom([1, 0]), floor, 2, 2, bounds, true, 0);
        expect(floorToText(floor)[2]).toBe("#.~~~.#");
    });

    it("stops at once when no step lands inside the bounds", () => {
        const floor = floorFromText(rows);
        generateMazeLine(scriptedRandom(), floor, 3, 3, { startX: 3, startY: 3, endX: 4, endY: 4 }, false, 0);
        expect(floorToText(floor)).toEqual(rows);
    });
});

describe("generateMaze", () => {
    it("keeps every open tile reachable from the entrance", () => {
        for (let seed = 1; seed <= 10; seed++) {
            const floor = allocFloor(13, 11);
            const room = { startX: 2, startY: 2, endX: 11, endY: 9 };
            fillRect(floor, room, (tile) => {
                tile.terrain = Terrain.Normal;
                tile.roomIndex = 0;
            });
            openHallway(floor, 1, 5);

            generateMaze(new JenkinsRandom(seed), floor, room, false, 0);

            const reached = reachableFrom(floor, 1, 5).flat().filter((cell) => cell === 1).length;
            expect(reached).toBe(countWalkableTiles(floor));
            expect(floor.tiles[2][5].terrain).toBe(Terrain.Normal);
            // Every interior lattice point becomes a wall
            for (let x = 3; x < 10; x += 2) {
                for (let y = 3; y < 8; y += 2) {
                    expect(floor.tiles[x][y].terrain).toBe(Terrain.Wall);
                }
            }
        }
    });
});

describe("generateMazeRoom", () => {
    it("does nothing at a chance of 0 and draws nothing", () => {
        const { floor, grid } = singleRoom(13, 11, { startX: 2, startY: 2, endX: 11, endY: 9 });
        const rng = scriptedRandom();
        expect(generateMazeRoom(rng, floor, grid, 0, false)).toBe(false);
        expect(rng.consumed).toBe(0);
    });

    it("builds a maze in an odd-sized room", () => {
        const { floor, grid } = singleRoom(13, 11, { startX: 2, startY: 2, endX: 11, endY: 9 });
        expect(generateMazeRoom(new JenkinsRandom(1), floor, grid, 100, false)).toBe(true);
        expect(grid.cells[0][0].isMazeRoom).toBe(true);
        expect(floor.tiles[3][3].terrain).toBe(Terrain.Wall);
    });

    it("skips rooms with an even side", () => {
        const { floor, grid } = singleRoom(13, 11, { startX: 2, startY: 2, endX: 10, endY: 9 });
        expect(generateMazeRoom(new JenkinsRandom(1), floor, grid, 100, false)).toBe(false);
        expect(grid.cells[0][0].isMazeRoom).toBe(false);
    });
});

// =============================================================================
// Secondary structures & imperfections
// =============================================================================

describe("generateSecondaryStructures", () => {
    const room = { startX: 2, startY: 2, endX: 9, endY: 9 };

    it("fills the room center with a pool", () => {
        const { floor, grid } = singleRoom(12, 12, room);
        expect(generateSecondaryStructures(scriptedRandom([0, 0]), floor, grid)).toBe(1);
        const pool = findTiles(floor, (tile) => tile.terrain === Terrain.Secondary);
        expect(pool.length).toBe(9);
        expect(pool[0]).toEqual({ x: 4, y: 4 });
        expect(pool[8]).toEqual({ x: 6, y: 6 });
        expect(grid.cells[0][0].hasSecondaryStructure).toBe(true);
    });

    it("raises a lattice of pillars", () => {
        const { floor, grid } = singleRoom(12, 12, room);
        generateSecondaryStructures(scriptedRandom([0, 1]), floor, grid);
        for (const [x, y] of [[4, 4], [6, 4], [4, 6], [6, 6]]) {
            expect(floor.tiles[x][y].terrain).toBe(Terrain.Wall);
            expect(floor.tiles[x][y].roomIndex).toBe(ROOM_INDEX_HALLWAY);
        }
        expect(floor.tiles[5][5].terrain).toBe(Terrain.Normal);
    });

    it("skips rooms smaller than 5 × 5 without drawing", () => {
        const { floor, grid } = singleRoom(12, 12, { startX: 2, startY: 2, endX: 9, endY: 6 });
        const rng = scriptedRandom();
        expect(generateSecondaryStructures(rng, floor, grid)).toBe(0);
        expect(rng.consumed).toBe(0);
    });
});

describe("generateRoomImperfections", () => {
    it("walls off corners but not next to a hallway", () => {
        const { floor, grid } = singleRoom(12, 10, { startX: 2, startY: 2, endX: 9, endY: 7 });
        openHallway(floor, 1, 2);
        // Roll succeeds, every corner gets a nub of length 1
        expect(generateRoomImperfections(scriptedRandom([0, 1, 1, 1, 1]), floor, grid)).toBe(1);

        expect(floor.tiles[2][2].terrain).toBe(Terrain.Normal);
        for (const [x, y] of [[8, 2], [2, 6], [8, 6]]) {
            expect(floor.tiles[x][y].terrain).toBe(Terrain.Wall);
            expect(floor.tiles[x][y].roomIndex).toBe(ROOM_INDEX_HALLWAY);
        }
        expect(floor.tiles[3][2].terrain).toBe(Terrain.Normal);
        expect(grid.cells[0][0].isImperfect).toBe(true);
    });

    it("leaves rooms with a secondary structure alone", () => {
        const { floor, grid } = singleRoom(12, 10, { startX: 2, startY: 2, endX: 9, endY: 7 });
        grid.cells[0][0].hasSecondaryStructure = true;
        expect(generateRoomImperfections(scriptedRandom([0, 1, 1, 1, 1]), floor, grid)).toBe(0);
    });
});

// =============================================================================
// Extra hallways
// =============================================================================

describe("extraHallwayPath", () => {
    const rows = [
        "XXXXXXXXXX",
        "X00####11X",
        "XXXXXXXXXX",
    ];
    const room = { startX: 1, startY: 1, endX: 3, endY: 2 };

    it("walks until it meets an open tile", () => {
        expect(extraHallwayPath(scriptedRandom([1, 1, 1, 1]), floorFromText(rows), room, Direction.Right))
            .toEqual([{ x: 3, y: 1 }, { x: 4, y: 1 }, { x: 5, y: 1 }, { x: 6, y: 1 }]);
    });

    it("gives up on an impassable tile", () => {
        expect(extraHallwayPath(scriptedRandom(), floorFromText(rows), room, Direction.Left)).toBeNull();
    });

    it("gives up when a turn leads into the border", () => {
        // Turn on the first step, clockwise from Right is Down
        expect(extraHallwayPath(scriptedRandom([0, 0]), floorFromText(rows), room, Direction.Right)).toBeNull();
    });
});

describe("generateExtraHallways", () => {
    it("carves the path and flags the junctions at both ends", () => {
        const floor = floorFromText([
            "XXXXXXXXXX",
            "X00####11X",
            "XXXXXXXXXX",
        ]);
        const grid = initDungeonGrid([0, 10], [0, 3]);
        createRoom(floor, grid.cells[0][0], { startX: 1, startY: 1, endX: 3, endY: 2 }, 0);

        expect(generateExtraHallways(scriptedRandom([3, 1, 1, 1, 1]), floor, grid, 1)).toBe(1);
        expect(floorToText(floor)[1]).toBe("X..,,,,..X");
        expect(floor.tiles[2][1].flags & TileFlag.NATURAL_JUNCTION).toBeTruthy();
        expect(floor.tiles[7][1].flags & TileFlag.NATURAL_JUNCTION).toBeTruthy();
        expect(floor.tiles[1][1].flags & TileFlag.NATURAL_JUNCTION).toBeFalsy();
    });
});

// =============================================================================
// Kecleon shops & Monster Houses
// =============================================================================

describe("Kecleon shops", () => {
    const room = { startX: 2, startY: 2, endX: 9, endY: 8 };

    it("flagKecleonShop flags open tiles one in from the edge", () => {
        const { floor } = singleRoom(12, 11, room);
        floor.tiles[4][4].terrain = Terrain.Wall;
        flagKecleonShop(floor, room);
        const shop = findTiles(floor, (tile) => (tile.flags & TileFlag.IN_KECLEON_SHOP) !== 0);
        expect(shop.length).toBe(19);
        expect(shop[0]).toEqual({ x: 3, y: 3 });
        expect(shop[shop.length - 1]).toEqual({ x: 7, y: 6 });
    });

    it("generateKecleonShop picks a plain room", () => {
        const { floor, grid } = singleRoom(12, 11, room);
        expect(generateKecleonShop(scriptedRandom([0]), floor, grid, 100)).toBe(true);
        expect(grid.cells[0][0].isKecleonShop).toBe(true);
        expect(floor.tiles[3][3].flags & TileFlag.IN_KECLEON_SHOP).toBeTruthy();
        expect(floor.tiles[2][2].flags & TileFlag.IN_KECLEON_SHOP).toBeFalsy();
    });

    it("generateKecleonShop draws nothing at a chance of 0", () => {
        const { floor, grid } = singleRoom(12, 11, room);
        const rng = scriptedRandom();
        expect(generateKecleonShop(rng, floor, grid, 0)).toBe(false);
        expect(rng.consumed).toBe(0);
    });
});

describe("Monster Houses", () => {
    it("flags every tile of the chosen room", () => {
        const room = { startX: 2, startY: 2, endX: 9, endY: 8 };
        const { floor, grid } = singleRoom(12, 11, room);
        expect(generateMonsterHouse(scriptedRandom([0]), floor, grid, 100)).toBe(true);
        expect(grid.cells[0][0].isMonsterHouse).toBe(true);
        const house = findTiles(floor, (tile) => (tile.flags & TileFlag.IN_MONSTER_HOUSE) !== 0);
        expect(house.length).toBe(42);
        expect(house.every((pos) => isOpen(floor.tiles[pos.x][pos.y]))).toBe(true);
    });

    it("never turns a shop into a Monster House", () => {
        const { floor, grid } = singleRoom(12, 11, { startX: 2, startY: 2, endX: 9, endY: 8 });
        grid.cells[0][0].isKecleonShop = true;
        expect(generateMonsterHouse(scriptedRandom([0]), floor, grid, 100)).toBe(false);
    });
});
