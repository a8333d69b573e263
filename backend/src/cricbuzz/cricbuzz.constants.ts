// Injection tokens for the Cricbuzz HTTP client and its settings
export const CRICBUZZ_HTTP = Symbol("CRICBUZZ_HTTP");
export const CRICBUZZ_SETTINGS = Symbol("CRICBUZZ_SETTINGS");

export const RATE_LIMIT_MESSAGE = "Cricket API rate limit reached. Please wait a minute.";
