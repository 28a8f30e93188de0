import { IClientCountService } from "@core/interfaces";
import { Result, success, failure, unwrapOr } from "@core/types";
import { ClientCountError } from "@core/errors";
import {
  RASPAP_DEFAULT_BASE_URL,
  RASPAP_REQUEST_TIMEOUT_MS,
} from "@core/constants";
import { raspapClientsResponseSchema } from "@core/validation/schemas";
import { toError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("ClientCountService");

/**
 * Counts stations on the access point through the RaspAP REST API.
 * Without an API key no request is made and the count is 0.
 */
export class ClientCountService implements IClientCountService {
  private readonly baseUrl: string;

  constructor(
    private readonly apiKey: string | null,
    baseUrl: string = RASPAP_DEFAULT_BASE_URL,
    private readonly requestTimeoutMs: number = RASPAP_REQUEST_TIMEOUT_MS,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async getClientCount(apIface: string): Promise<number> {
    const result = await this.fetchCount(apIface);
    if (!result.success) {
      logger.debug(`Client count unavailable: ${result.error.message}`);
    }
    return unwrapOr(result, 0);
  }

  /**
   * Ask RaspAP for the stations on an interface.
   * Without an API key this is a count of 0.
   */
  async fetchCount(apIface: string): Promise<Result<number, ClientCountError>> {
    const apiKey = this.apiKey;
    if (!apiKey) {
      return success(0);
    }

    const url = `${this.baseUrl}/clients/${encodeURIComponent(apIface)}`;

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { access_token: apiKey, Accept: "application/json" },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      return failure(ClientCountError.networkUnreachable(url, toError(error)));
    }
    if (!response.ok) {
      return failure(
        ClientCountError.requestFailed(response.status, response.statusText),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return failure(ClientCountError.parseError(toError(error).message));
    }

    const parsed = raspapClientsResponseSchema.safeParse(body);
    if (!parsed.success) {
      return failure(ClientCountError.parseError("active_clients is invalid"));
    }

    const clients = parsed.data.active_clients;
    if (Array.isArray(clients)) {
      return success(clients.length);
    }
    return success(clients ? Object.keys(clients).length : 0);
  }
}
