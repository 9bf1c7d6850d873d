/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/catalogRepo";
export * from "./repos/cursorRepo";
export * from "./repos/runsRepo";
export * from "./repos/runLockRepo";
export * from "./repos/embeddingsRepo";
