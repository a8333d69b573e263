import { validateEnv } from "./env.validation";

describe("validateEnv", () => {
  it("applies defaults and converts numbers", () => {
    const env = validateEnv({
      RAPIDAPI_KEY: "test-key",
      DATABASE_URL: "postgres://user@localhost:5432/cricket",
      PORT: "4000",
    });

    expect(env.PORT).toBe(4000);
    expect(env.RAPIDAPI_HOST).toBe("cricbuzz-cricket.p.rapidapi.com");
    expect(env.LIVE_MATCHES_TTL_SEC).toBe(60);
    expect(env.CRICBUZZ_RATE_LIMIT_RETRIES).toBe(1);
    expect(env.DB_PORT).toBe(5432);
  });

  it("accepts discrete DB_* settings instead of a URL", () => {
    const env = validateEnv({
      RAPIDAPI_KEY: "test-key",
      DB_HOST: "localhost",
      DB_NAME: "cricket",
      DB_USER: "analyst",
      DB_PORT: "6543",
    });

    expect(env.DB_PORT).toBe(6543);
  });

  it("names the missing API key", () => {
    expect(() => validateEnv({ DATABASE_URL: "postgres://localhost/cricket" })).toThrow(
      /Missing RAPIDAPI_KEY/
    );
  });

  it("requires some database settings", () => {
    expect(() => validateEnv({ RAPIDAPI_KEY: "test-key", DB_HOST: "localhost" })).toThrow(
      "Invalid environment:\n- Missing database settings: set DATABASE_URL or DB_HOST, DB_NAME and DB_USER in backend/.env"
    );
  });

  it("rejects non-numeric knobs", () => {
    expect(() =>
      validateEnv({ RAPIDAPI_KEY: "test-key", DATABASE_URL: "postgres://x", SCORECARD_TTL_SEC: "soon" })
    ).toThrow(/SCORECARD_TTL_SEC/);
  });
});
