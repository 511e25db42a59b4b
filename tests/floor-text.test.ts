/*
 *  floor-text.test.ts — Tests for the ASCII floor format
 *  floor-architect
 */

import { describe, it, expect } from "vitest";
import { floorFromText, floorToText } from "../src/grid/floor-text.js";
import { Terrain } from "../src/types/enums.js";
import { ROOM_INDEX_ANCHOR, ROOM_INDEX_HALLWAY } from "../src/types/constants.js";
import { TileFlag } from "../src/types/flags.js";

describe("floorFromText", () => {
    it("reads every tile character", () => {
        const floor = floorFromText(["#X.,o~_K7"]);
        const [wall, border, room, hall, anchor, water, chasm, door, seven] = floor.tiles.map((column) => column[0]);

        expect(wall.terrain).toBe(Terrain.Wall);
        expect(border.flags & TileFlag.IMPASSABLE).toBeTruthy();
        expect(room).toMatchObject({ terrain: Terrain.Normal, roomIndex: 0 });
        expect(hall).toMatchObject({ terrain: Terrain.Normal, roomIndex: ROOM_INDEX_HALLWAY });
        expect(anchor).toMatchObject({ terrain: Terrain.Normal, roomIndex: ROOM_INDEX_ANCHOR });
        expect(water.terrain).toBe(Terrain.Secondary);
        expect(chasm.terrain).toBe(Terrain.Chasm);
        expect(door.flags & TileFlag.KEY_DOOR).toBeTruthy();
        expect(seven).toMatchObject({ terrain: Terrain.Normal, roomIndex: 7 });
    });

    it("stores tiles column-major", () => {
        const floor = floorFromText([
            "#.",
            "##",
            ",#",
        ]);
        expect(floor.width).toBe(2);
        expect(floor.height).toBe(3);
        expect(floor.tiles[1][0].terrain).toBe(Terrain.Normal);
        expect(floor.tiles[0][2].roomIndex).toBe(ROOM_INDEX_HALLWAY);
    });

    it("adds no border", () => {
        const floor = floorFromText(["..", ".."]);
        expect(floor.tiles[0][0].flags).toBe(0);
    });

    it("rejects rows of unequal length", () => {
        expect(() => floorFromText(["###", "##"])).toThrow("Row 1 has length 2, expected 3");
    });

    it("rejects unknown characters", () => {
        expect(() => floorFromText(["#?#"])).toThrow("Unknown floor character '?'");
    });
});

describe("floorToText", () => {
    it("renders what floorFromText reads", () => {
        const rows = [
            "XXXXXX",
            "X..,oX",
            "X~_K#X",
            "XXXXXX",
        ];
        expect(floorToText(floorFromText(rows))).toEqual(rows);
    });

    it("renders every room as '.'", () => {
        expect(floorToText(floorFromText(["0123"]))).toEqual(["...."]);
    });
});
