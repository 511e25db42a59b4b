/*
 *  grid/index.ts — Barrel export for tile floors and scratch grids
 *  floor-architect
 */

export * from "./grid.js";
export * from "./floor.js";
export * from "./floor-text.js";
