/**
 * Tests for logger creation functionality
 * Tests logger configuration without side effects
 */

// Mock pino first
const mockPino = jest.fn();
jest.mock("pino", () => mockPino);

import { createLogger } from "../../src/core/logger.js";

const defaults = {
  name: "groundwork",
  redact: ["passphrase", "password", "*.passphrase", "*.password"],
};

const prettyTransport = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    singleLine: true,
    ignore: "pid,hostname",
    destination: 2,
  },
};

describe("Logger Creation", () => {
  beforeEach(() => {
    mockPino.mockReset();
    mockPino.mockReturnValue({
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
    });
  });

  describe("createLogger", () => {
    it("should create a pretty logger on stderr by default", () => {
      createLogger();

      expect(mockPino).toHaveBeenCalledWith({
        ...defaults,
        level: "info",
        transport: prettyTransport,
      });
    });

    it("should log at debug level when verbose", () => {
      createLogger({ verbose: true });

      expect(mockPino).toHaveBeenCalledWith({
        ...defaults,
        level: "debug",
        transport: prettyTransport,
      });
    });

    it("should emit JSON lines without pretty formatting", () => {
      createLogger({ pretty: false });

      expect(mockPino).toHaveBeenCalledWith({
        ...defaults,
        level: "info",
        transport: undefined,
      });
    });

    it("should let an explicit level override the verbosity default", () => {
      createLogger({ level: "warn", verbose: false });

      expect(mockPino).toHaveBeenCalledWith({
        ...defaults,
        level: "warn",
        transport: prettyTransport,
      });
    });

    it("should let custom pino options replace the defaults", () => {
      createLogger({ name: "bootstrap", redact: ["token"], verbose: true, pretty: false });

      expect(mockPino).toHaveBeenCalledWith({
        name: "bootstrap",
        redact: ["token"],
        level: "debug",
        transport: undefined,
      });
    });
  });
});
