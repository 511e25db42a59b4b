/*
 *  architect/index.ts — Public API for the floor architect
 *  floor-architect
 */

export * from "./helpers.js";
export * from "./grid-layout.js";
export * from "./hallways.js";
export * from "./junctions.js";
export * from "./features.js";
export * from "./lakes.js";
export * from "./analysis.js";
export * from "./spawns.js";
export * from "./layouts.js";
export * from "./fixed-rooms.js";
export * from "./architect.js";
