/**
 * @loopwright/engine-telemetry
 */

export * from "./logging";
