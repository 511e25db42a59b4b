/*
 *  math/index.ts — Barrel export for the random source
 *  floor-architect
 */

export * from "./rng.js";
