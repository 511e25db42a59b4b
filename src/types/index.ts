/*
 *  types/index.ts — Re-exports all type definitions
 *  floor-architect
 */

export * from "./constants.js";
export * from "./enums.js";
export * from "./flags.js";
export * from "./types.js";
