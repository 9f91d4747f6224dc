/**
 * @loopwright/engine-core
 *
 * Shared types, errors and configuration for the agent engine.
 */

export * from "./config";
export * from "./errors";
export type * from "./types/events";
export type * from "./types/messages";
export type * from "./types/session";
export type * from "./types/tools";
export * from "./types/result";
