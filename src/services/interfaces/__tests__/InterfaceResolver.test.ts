const mockStat = jest.fn();
const mockReadFile = jest.fn();

jest.mock("fs/promises", () => ({
  stat: (...args: unknown[]) => mockStat(...args),
  readFile: (...args: unknown[]) => mockReadFile(...args),
}));

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

import { InterfaceResolver } from "../InterfaceResolver";

const CONF_PATH = "/etc/hostapd/hostapd.conf";

function enoent(): Error {
  return Object.assign(new Error("ENOENT: no such file or directory"), {
    code: "ENOENT",
  });
}

describe("InterfaceResolver", () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockStat.mockResolvedValue({ mtimeMs: 1000 });
  });

  it("should use wlan1 as AP and wlan0 as client for interface=wlan1", async () => {
    mockReadFile.mockResolvedValue(
      "driver=nl80211\ninterface=wlan1\nssid=PanelAP\nchannel=6\n",
    );

    const roles = await new InterfaceResolver(CONF_PATH).resolve();

    expect(mockReadFile).toHaveBeenCalledWith(CONF_PATH, "utf8");
    expect(roles).toEqual({
      apIface: "wlan1",
      clientIface: "wlan0",
      apSsid: "PanelAP",
    });
  });

  it("should swap the roles for interface=wlan0", async () => {
    mockReadFile.mockResolvedValue("interface=wlan0\n");

    const roles = await new InterfaceResolver(CONF_PATH).resolve();

    expect(roles).toEqual({
      apIface: "wlan0",
      clientIface: "wlan1",
      apSsid: null,
    });
  });

  it("should return the defaults when the file is missing", async () => {
    mockStat.mockRejectedValue(enoent());

    const roles = await new InterfaceResolver(CONF_PATH).resolve();

    expect(mockReadFile).not.toHaveBeenCalled();
    expect(roles).toEqual({
      apIface: "wlan1",
      clientIface: "wlan0",
      apSsid: null,
    });
  });

  it("should return the defaults when the file cannot be read", async () => {
    mockReadFile.mockRejectedValue(
      Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" }),
    );

    const roles = await new InterfaceResolver(CONF_PATH).resolve();

    expect(roles.apIface).toBe("wlan1");
    expect(roles.clientIface).toBe("wlan0");
  });

  it("should return the defaults for an unknown interface name", async () => {
    mockReadFile.mockResolvedValue("interface=eth0\nssid=PanelAP\n");

    const roles = await new InterfaceResolver(CONF_PATH).resolve();

    expect(roles).toEqual({
      apIface: "wlan1",
      clientIface: "wlan0",
      apSsid: "PanelAP",
    });
  });

  it("should only use the first interface line", async () => {
    mockReadFile.mockResolvedValue(
      "# interface=wlan1\ninterface=wlan0\ninterface=wlan1\n",
    );

    const roles = await new InterfaceResolver(CONF_PATH).resolve();

    expect(roles.apIface).toBe("wlan0");
  });

  it("should ignore keys inside sections by default", async () => {
    mockReadFile.mockResolvedValue(
      "[bss]\ninterface=wlan0\n[main]\ninterface=wlan1\n",
    );

    const roles = await new InterfaceResolver(CONF_PATH).resolve();

    expect(roles).toEqual({
      apIface: "wlan1",
      clientIface: "wlan0",
      apSsid: null,
    });
    expect(mockReadFile).toHaveBeenCalledTimes(1);
  });

  it("should read keys from the configured section", async () => {
    mockReadFile.mockResolvedValue(
      "interface=wlan1\n[ap]\ninterface=wlan0\nssid=SectionAP\n",
    );

    const roles = await new InterfaceResolver(CONF_PATH, "ap").resolve();

    expect(roles).toEqual({
      apIface: "wlan0",
      clientIface: "wlan1",
      apSsid: "SectionAP",
    });
  });

  it("should reuse the parsed roles while the file is unchanged", async () => {
    mockReadFile.mockResolvedValue("interface=wlan0\n");
    const resolver = new InterfaceResolver(CONF_PATH);

    await resolver.resolve();
    const roles = await resolver.resolve();

    expect(mockReadFile).toHaveBeenCalledTimes(1);
    expect(roles.apIface).toBe("wlan0");
  });

  it("should re-read the file after it changes", async () => {
    mockReadFile
      .mockResolvedValueOnce("interface=wlan0\n")
      .mockResolvedValueOnce("interface=wlan1\n");
    const resolver = new InterfaceResolver(CONF_PATH);

    const before = await resolver.resolve();
    mockStat.mockResolvedValue({ mtimeMs: 2000 });
    const after = await resolver.resolve();

    expect(before.apIface).toBe("wlan0");
    expect(after.apIface).toBe("wlan1");
    expect(after.clientIface).toBe("wlan0");
  });
});
