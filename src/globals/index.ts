/*
 *  globals/index.ts — Barrel export for shared lookup tables
 *  floor-architect
 */

export * from "./tables.js";
