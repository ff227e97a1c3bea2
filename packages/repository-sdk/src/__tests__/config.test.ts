import { ValidationError } from "@archivum/errors";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadClientConfig } from "../config.js";
import { RepositoryValidationError } from "../errors.js";

describe("loadClientConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return an empty config when nothing is set", () => {
    expect(loadClientConfig({})).toEqual({});
  });

  it("should read the URL, token and timeout", () => {
    const config = loadClientConfig({
      ARCHIVUM_API_URL: "https://repo.test/api",
      ARCHIVUM_API_TOKEN: "test-secret",
      ARCHIVUM_TIMEOUT_MS: "2500",
    });

    expect(config).toEqual({
      baseUrl: "https://repo.test/api",
      token: "test-secret",
      timeout: 2500,
    });
  });

  it("should read basic auth credentials", () => {
    const config = loadClientConfig({
      ARCHIVUM_API_USERNAME: "ingest",
      ARCHIVUM_API_PASSWORD: "test-secret",
    });

    expect(config).toEqual({ username: "ingest", password: "test-secret" });
  });

  it("should reject a username without a password", () => {
    expect(() => loadClientConfig({ ARCHIVUM_API_USERNAME: "ingest" })).toThrow(
      "Invalid configuration: ARCHIVUM_API_USERNAME must be set together with ARCHIVUM_API_PASSWORD",
    );
  });

  it("should ignore unrelated variables", () => {
    expect(loadClientConfig({ HOME: "/root", PATH: "/usr/bin" })).toEqual({});
  });

  it("should build a logger at the configured level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    const config = loadClientConfig({ ARCHIVUM_LOG_LEVEL: "info" });
    config.logger?.info("hello");
    config.logger?.debug("hidden");

    expect(info).toHaveBeenCalledWith("[repository-sdk] hello");
    expect(debug).not.toHaveBeenCalled();
  });

  it("should reject a relative URL", () => {
    expect(() => loadClientConfig({ ARCHIVUM_API_URL: "repo/api" })).toThrow(
      "Invalid configuration: ARCHIVUM_API_URL must be an absolute URL",
    );
  });

  it("should reject a non-positive timeout", () => {
    try {
      loadClientConfig({ ARCHIVUM_TIMEOUT_MS: "0" });
      expect.fail("Should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(RepositoryValidationError);
      if (error instanceof RepositoryValidationError) {
        expect(error.field).toBe("ARCHIVUM_TIMEOUT_MS");
        expect(error.message).toBe("Invalid configuration: ARCHIVUM_TIMEOUT_MS must be a positive integer");
        expect(error.code).toBe("VALIDATION_FAILED");
        expect(error).toBeInstanceOf(ValidationError);
        expect(error.issues).toEqual([
          {
            field: "ARCHIVUM_TIMEOUT_MS",
            message: "Invalid configuration: ARCHIVUM_TIMEOUT_MS must be a positive integer",
            code: "invalid_value",
          },
        ]);
      }
    }
  });

  it("should reject an unknown log level", () => {
    expect(() => loadClientConfig({ ARCHIVUM_LOG_LEVEL: "verbose" })).toThrow(RepositoryValidationError);
  });
});
