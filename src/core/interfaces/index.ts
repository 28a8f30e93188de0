/**
 * Core interfaces
 *
 * These interfaces define the contracts between the orchestrator's services.
 * They enable dependency injection and make the codebase fully testable.
 */

export * from "./IProcessRunner";
export * from "./IInterfaceResolver";
export * from "./IWiFiService";
export * from "./IVpnController";
export * from "./IGeolocationRefresher";
export * from "./ISystemStatusReader";
export * from "./IConfigService";
export * from "./IStatusOrchestrator";
