import { BaseError } from "@errors/BaseError";

class TestError extends BaseError {
  constructor(
    message: string,
    code: string = "TEST_ERROR",
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }
}

describe("BaseError", () => {
  describe("constructor", () => {
    it("should create error with message and code", () => {
      const error = new TestError("Test message", "TEST_CODE");

      expect(error.message).toBe("Test message");
      expect(error.code).toBe("TEST_CODE");
      expect(error.recoverable).toBe(false);
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it("should keep recoverable flag and context", () => {
      const error = new TestError("Test message", "TEST_CODE", true, {
        iface: "wlan0",
      });

      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual({ iface: "wlan0" });
    });

    it("should set the error name to the constructor name", () => {
      expect(new TestError("x").name).toBe("TestError");
    });

    it("should be an instance of Error and of the subclass", () => {
      const error = new TestError("x");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(TestError);
    });
  });

  describe("toJSON", () => {
    it("should serialize error fields", () => {
      const error = new TestError("Test message", "TEST_CODE", true, {
        key: "value",
      });
      const json = error.toJSON();

      expect(json.name).toBe("TestError");
      expect(json.message).toBe("Test message");
      expect(json.code).toBe("TEST_CODE");
      expect(json.recoverable).toBe(true);
      expect(json.context).toEqual({ key: "value" });
      expect(json.timestamp).toBe(error.timestamp.toISOString());
    });
  });

  describe("getUserMessage", () => {
    it("should return the centralized message for a known code", () => {
      const error = new TestError("Technical", "VPN_PROFILE_NOT_FOUND");
      expect(error.getUserMessage()).toBe("VPN profile file is missing.");
    });

    it("should return the category fallback for a known prefix", () => {
      const error = new TestError("Technical", "WIFI_FUTURE_ERROR");
      expect(error.getUserMessage()).toBe("Wi-Fi error occurred.");
    });

    it("should return the generic fallback for an unknown code", () => {
      const error = new TestError("Technical", "UNKNOWN_CODE");
      expect(error.getUserMessage()).toBe("An error occurred.");
    });
  });
});
