import { ClientCountService } from "../ClientCountService";
import { ClientCountErrorCode } from "@core/errors";

// Mock the fetch API
const mockFetch = jest.fn();
global.fetch = mockFetch;

// Mock the logger
jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

function jsonResponse(body: unknown, status: number = 200) {
  return {
    ok: status === 200,
    status,
    statusText: status === 200 ? "OK" : "Unauthorized",
    json: async () => body,
  };
}

describe("ClientCountService", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("should return 0 without a request when no API key is set", async () => {
    const service = new ClientCountService(null);

    await expect(service.getClientCount("wlan1")).resolves.toBe(0);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("should count a list of active clients", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ active_clients: [{ mac: "a" }, { mac: "b" }] }),
    );
    const service = new ClientCountService("test-key", "http://raspap.test/");

    const count = await service.getClientCount("wlan1");

    expect(count).toBe(2);
    expect(mockFetch).toHaveBeenCalledWith(
      "http://raspap.test/clients/wlan1",
      expect.objectContaining({
        headers: { access_token: "test-key", Accept: "application/json" },
      }),
    );
  });

  it("should count the keys of an active client map", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ active_clients: { a: {}, b: {}, c: {} } }),
    );
    const service = new ClientCountService("test-key");

    await expect(service.getClientCount("wlan1")).resolves.toBe(3);
  });

  it("should return 0 when active_clients is missing", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ clients: 4 }));
    const service = new ClientCountService("test-key");

    await expect(service.getClientCount("wlan1")).resolves.toBe(0);
  });

  it("should return 0 on HTTP errors", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, 401));
    const service = new ClientCountService("test-key");

    await expect(service.getClientCount("wlan1")).resolves.toBe(0);
  });

  it("should return 0 when the API is unreachable", async () => {
    mockFetch.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
    const service = new ClientCountService("test-key");

    await expect(service.getClientCount("wlan1")).resolves.toBe(0);
  });
  describe("fetchCount", () => {
    it("should report HTTP errors as a failed request", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, 401));
      const service = new ClientCountService("test-key");

      const result = await service.fetchCount("wlan1");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ClientCountErrorCode.REQUEST_FAILED);
        expect(result.error.message).toBe(
          "RaspAP replied HTTP 401: Unauthorized",
        );
      }
    });

    it("should report an unreachable API", async () => {
      mockFetch.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));
      const service = new ClientCountService("test-key", "http://raspap.test");

      const result = await service.fetchCount("wlan1");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(
          ClientCountErrorCode.NETWORK_UNREACHABLE,
        );
        expect(result.error.context).toEqual({
          url: "http://raspap.test/clients/wlan1",
          originalError: "connect ECONNREFUSED",
        });
      }
    });

    it("should report a malformed active_clients value", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ active_clients: 7 }));
      const service = new ClientCountService("test-key");

      const result = await service.fetchCount("wlan1");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ClientCountErrorCode.PARSE_ERROR);
      }
    });
  });
});
