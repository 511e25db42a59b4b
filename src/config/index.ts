/*
 *  config/index.ts — Barrel export for floor configuration
 *  floor-architect
 */

export * from "./floor-properties.js";
