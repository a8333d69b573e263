import {
  ApiError,
  createTopPlayer,
  deleteTopPlayer,
  getLiveMatches,
  getTopPlayerLeaders,
  listTopPlayers,
  runQuery,
  searchPlayers,
  updateTopPlayer,
} from "./api";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("lib/api", () => {
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    fetchMock = jest.spyOn(globalThis, "fetch");
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it("GETs live matches from the backend", async () => {
    fetchMock.mockImplementation(async () => jsonResponse([{ id: 1, name: "1st Test" }]));

    await expect(getLiveMatches()).resolves.toEqual([{ id: 1, name: "1st Test" }]);
    expect(fetchMock).toHaveBeenCalledWith("http://localhost:3000/matches/live", {
      method: "GET",
      headers: undefined,
      body: undefined,
    });
  });

  it("encodes the player search term", async () => {
    fetchMock.mockImplementation(async () => jsonResponse([]));

    await searchPlayers("de Villiers & co");

    expect(fetchMock.mock.calls[0][0]).toBe(
      "http://localhost:3000/players/search?name=de%20Villiers%20%26%20co"
    );
  });

  it("builds the top players query string only from given params", async () => {
    fetchMock.mockImplementation(async () => jsonResponse([]));

    await listTopPlayers();
    await listTopPlayers({ name: "kohli", sort: "name" });

    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:3000/top-players");
    expect(fetchMock.mock.calls[1][0]).toBe("http://localhost:3000/top-players?name=kohli&sort=name");
  });

  it("passes the name filter to the leader boards", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ byRuns: [], byHundreds: [] }));

    await getTopPlayerLeaders();
    await getTopPlayerLeaders(10, "sharma");

    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:3000/top-players/leaders?limit=10");
    expect(fetchMock.mock.calls[1][0]).toBe("http://localhost:3000/top-players/leaders?limit=10&name=sharma");
  });

  it("sends JSON bodies for writes", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ id: 1 }));

    await createTopPlayer({
      playerId: 7,
      name: "Test Player",
      matchesPlayed: 1,
      inningsBatted: 1,
      runs: 50,
      average: 50,
      hundred: 0,
    });
    await updateTopPlayer(7, { runs: 60 });

    expect(fetchMock.mock.calls[0][1]).toEqual({
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{"playerId":7,"name":"Test Player","matchesPlayed":1,"inningsBatted":1,"runs":50,"average":50,"hundred":0}',
    });
    expect(fetchMock.mock.calls[1][0]).toBe("http://localhost:3000/top-players/7");
    expect(fetchMock.mock.calls[1][1]).toEqual({
      method: "PATCH",
      headers: { "Content-Type": "application/json" },
      body: '{"runs":60}',
    });
  });

  it("POSTs to run a canned query and DELETEs by player id", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}));

    await runQuery("q3");
    await deleteTopPlayer(9);

    expect(fetchMock.mock.calls[0][0]).toBe("http://localhost:3000/queries/q3/run");
    expect(fetchMock.mock.calls[0][1].method).toBe("POST");
    expect(fetchMock.mock.calls[1][0]).toBe("http://localhost:3000/top-players/9");
    expect(fetchMock.mock.calls[1][1].method).toBe("DELETE");
  });

  it("surfaces the backend error message and status", async () => {
    fetchMock.mockImplementation(async () =>
      jsonResponse(
        { statusCode: 429, message: "Cricket API rate limit reached. Please wait a minute." },
        429
      )
    );

    const err = await getLiveMatches().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({
      status: 429,
      message: "Cricket API rate limit reached. Please wait a minute.",
    });
  });

  it("joins validation messages", async () => {
    fetchMock.mockImplementation(async () =>
      jsonResponse({ statusCode: 400, message: ["Player name is required", "runs must not be less than 0"] }, 400)
    );

    await expect(createTopPlayer({
      playerId: 1,
      name: "",
      matchesPlayed: 0,
      inningsBatted: 0,
      runs: -1,
      average: 0,
      hundred: 0,
    })).rejects.toMatchObject({
      status: 400,
      message: "Player name is required; runs must not be less than 0",
    });
  });

  it("falls back to the raw body when it is not JSON", async () => {
    fetchMock.mockImplementation(async () => new Response("Bad gateway", { status: 502 }));

    await expect(getLiveMatches()).rejects.toMatchObject({
      status: 502,
      message: "API /matches/live failed (502): Bad gateway",
    });
  });
});
