/**
 * Core types
 *
 * This barrel file exports all type definitions used throughout the application.
 */
export * from "./ResultTypes";
export * from "./ConfigTypes";
export * from "./NetworkTypes";
export * from "./VpnTypes";
export * from "./GeolocationTypes";
export * from "./ProcessTypes";
export * from "./SystemTypes";
export * from "./SnapshotTypes";
