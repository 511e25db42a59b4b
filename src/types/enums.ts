/*
 *  enums.ts — Enumerations shared across floor generation
 *  floor-architect
 *
 *  This program is free software: you can redistribute it and/or modify
 *  it under the terms of the GNU Affero General Public License as
 *  published by the Free Software Foundation, either version 3 of the
 *  License, or (at your option) any later version.
 */

// ===== Terrain =====

export enum Terrain {
    Wall = 0,
    Normal = 1,
    Secondary = 2,
    Chasm = 3,
}

// ===== Directions =====

/** Cardinal directions, indexing into `nbDirs`. */
export enum Direction {
    NoDirection = -1,
    Up = 0,
    Down = 1,
    Left = 2,
    Right = 3,
}

// ===== Grid layout =====

export enum CellRole {
    Unused = 0,
    Room = 1,
    Anchor = 2,
}

export enum FloorLayout {
    Large = 0,
    Small = 1,
    OneRoomMonsterHouse = 2,
    OuterRing = 3,
    Crossroads = 4,
    TwoRoomsWithMonsterHouse = 5,
    Line = 6,
    Cross = 7,
    Medium = 8,
    Beetle = 9,
    OuterRooms = 10,
}

// ===== Entities =====

export enum EntityKind {
    Stairs = 0,
    HiddenStairs = 1,
    Item = 2,
    Trap = 3,
    Enemy = 4,
    Player = 5,
}

export enum HiddenStairsType {
    None = 0,
    SecretBazaar = 1,
    SecretRoom = 2,
}

export enum ItemPlacement {
    Room = 0,
    Buried = 1,
    MonsterHouse = 2,
    Shop = 3,
}

/** Keys of the spawn eligibility table. */
export enum PlacementKind {
    Stairs = "stairs",
    HiddenStairs = "hiddenStairs",
    Item = "item",
    BuriedItem = "buriedItem",
    MonsterHouseItem = "monsterHouseItem",
    ShopItem = "shopItem",
    Trap = "trap",
    MonsterHouseTrap = "monsterHouseTrap",
    Player = "player",
    Enemy = "enemy",
    MonsterHouseEnemy = "monsterHouseEnemy",
}

// ===== Orchestration =====

export enum GenerationState {
    ResetFloor = "ResetFloor",
    LayoutSelected = "LayoutSelected",
    FixedRoomLoaded = "FixedRoomLoaded",
    GridBuilt = "GridBuilt",
    HallwaysCarved = "HallwaysCarved",
    JunctionsResolved = "JunctionsResolved",
    FeaturesApplied = "FeaturesApplied",
    ReachabilityChecked = "ReachabilityChecked",
    Accepted = "Accepted",
    Retry = "Retry",
    Fallback = "Fallback",
    EntitiesPlaced = "EntitiesPlaced",
    Done = "Done",
}

export enum GenerationFailure {
    StructuralFailure = "StructuralFailure",
    FixedRoomNotFound = "FixedRoomNotFound",
    AttemptsExhausted = "AttemptsExhausted",
}
