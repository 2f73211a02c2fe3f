import {
  getBoolean,
  getEnvVar,
  getNumber,
  getStage,
  getString,
  isProduction,
  isTest,
} from "../../util/env";
import { ConfigError } from "../../util/errors";

describe("env utils", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("stage resolution with STAGE", () => {
    process.env.STAGE = "prod";
    expect(getStage()).toBe("prod");
    expect(isProduction()).toBe(true);
  });

  test("stage fallback to NODE_ENV", () => {
    delete process.env.STAGE;
    process.env.NODE_ENV = "production";
    expect(getStage()).toBe("prod");
  });

  test("isTest is true under the test runner", () => {
    expect(isTest()).toBe(true);
  });

  test("getEnvVar returns undefined when missing and not required", () => {
    expect(getEnvVar("UNKNOWN_VAR")).toBeUndefined();
  });

  test("getEnvVar throws ConfigError when required", () => {
    delete process.env.STAGE;
    process.env.NODE_ENV = "development";
    expect(() => getEnvVar("UNKNOWN_VAR", { required: true })).toThrow(
      new ConfigError(
        "Missing required env var: UNKNOWN_VAR__dev or UNKNOWN_VAR"
      )
    );
  });

  test("getEnvVar stageAware picks staged value first", () => {
    process.env.STAGE = "dev";
    process.env.MY_KEY__dev = "staged";
    process.env.MY_KEY = "plain";
    expect(getEnvVar("MY_KEY")).toBe("staged");
    expect(getEnvVar("MY_KEY", { stageAware: false })).toBe("plain");
  });

  test("parsers: number and boolean", () => {
    process.env.NUMBER_KEY = "42";
    process.env.BOOL_KEY = "true";
    expect(getNumber("NUMBER_KEY")).toBe(42);
    expect(getBoolean("BOOL_KEY")).toBe(true);
  });

  test("number parser rejects garbage", () => {
    process.env.NUMBER_KEY = "forty";
    expect(() => getNumber("NUMBER_KEY", 1)).toThrow(
      "Env var NUMBER_KEY is not a number: forty"
    );
  });

  test("getString returns default", () => {
    expect(getString("NOPE", "x")).toBe("x");
  });
});
