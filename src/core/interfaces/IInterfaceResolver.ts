import { InterfaceRoles } from "@core/types";

/**
 * Interface Resolver Interface
 *
 * Decides which radio is the access point and which is the client.
 */
export interface IInterfaceResolver {
  /**
   * Resolve interface roles. Never rejects; falls back to the default pair.
   */
  resolve(): Promise<InterfaceRoles>;
}
