import { afterEach, describe, test, expect, vi } from "vitest";
import { ArbitrageEngineError, RateLimitedError, TransientVenueError } from "../src/errors";
import { fetchJson, parseRetryAfter } from "../src/venues/http";
import {
  KalshiClient,
  parseGameTitle,
  parseKalshiMarket,
} from "../src/venues/kalshi/client";
import { parseMarketsResponse, parseOrderbookResponse, type KalshiMarketRaw } from "../src/venues/kalshi/types";
import { OddsApiClient, parseOddsEvents } from "../src/venues/oddsApi/client";
import { parseEventsResponse, type OddsApiEventRaw } from "../src/venues/oddsApi/types";

function jsonResponse(body: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function stubFetch(respond: (url: string) => Response) {
  const fetchMock = vi.fn((input: string | URL | Request) =>
    Promise.resolve(respond(String(input)))
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

function rawMarket(overrides: Partial<KalshiMarketRaw> = {}): KalshiMarketRaw {
  return {
    ticker: "KXNBAGAME-26FEB01OKCDEN-OKC",
    event_ticker: "KXNBAGAME-26FEB01OKCDEN",
    status: "active",
    title: "Oklahoma City at Denver Winner?",
    close_time: "2026-02-16T03:00:00Z",
    occurrence_datetime: "2026-02-02T03:00:00Z",
    ...overrides,
  };
}

describe("kalshi", () => {
  test("parseGameTitle splits away and home", () => {
    expect(parseGameTitle("Oklahoma City at Denver Winner?")).toEqual(["Oklahoma City", "Denver"]);
    expect(parseGameTitle("Los Angeles L vs Boston")).toEqual(["Los Angeles L", "Boston"]);
    expect(parseGameTitle("Will it rain tomorrow?")).toBeNull();
  });

  describe("parseKalshiMarket", () => {
    test("resolves participants and the subject from the ticker suffix", () => {
      const instrument = parseKalshiMarket(rawMarket(), "basketball_nba");
      expect(instrument).toEqual({
        id: "KXNBAGAME-26FEB01OKCDEN-OKC",
        venue: "kalshi",
        category: "basketball_nba",
        title: "Oklahoma City at Denver Winner?",
        participants: ["Oklahoma City Thunder", "Denver Nuggets"],
        subject: "Oklahoma City Thunder",
        marketType: "winner",
        startTime: Date.parse("2026-02-02T03:00:00Z"),
      });
    });

    test("prefers yes_sub_title when it names a participant", () => {
      const instrument = parseKalshiMarket(
        rawMarket({ ticker: "KXNBAGAME-26FEB01OKCDEN-X", yes_sub_title: "Denver" }),
        "basketball_nba"
      );
      expect(instrument?.subject).toBe("Denver Nuggets");
    });

    test("falls back to close_time for the start", () => {
      const instrument = parseKalshiMarket(
        rawMarket({ occurrence_datetime: undefined }),
        "basketball_nba"
      );
      expect(instrument?.startTime).toBe(Date.parse("2026-02-16T03:00:00Z"));
    });

    test("skips closed markets and unknown subjects", () => {
      expect(parseKalshiMarket(rawMarket({ status: "closed" }), "basketball_nba")).toBeNull();
      expect(
        parseKalshiMarket(rawMarket({ ticker: "KXNBAGAME-26FEB01OKCDEN-XYZ" }), "basketball_nba")
      ).toBeNull();
      expect(parseKalshiMarket(rawMarket({ title: "Total points?" }), "basketball_nba")).toBeNull();
    });
  });

  test("parseMarketsResponse drops malformed entries", () => {
    const parsed = parseMarketsResponse({
      markets: [rawMarket(), { ticker: 42 }],
      cursor: "abc",
    });
    expect(parsed.markets).toHaveLength(1);
    expect(parsed.cursor).toBe("abc");
    expect(parseMarketsResponse(null)).toEqual({ markets: [], cursor: null });
  });

  test("parseOrderbookResponse keeps numeric levels", () => {
    expect(
      parseOrderbookResponse({ orderbook: { yes: [[42, 25], ["x", 1]], no: null } })
    ).toEqual({ yes: [[42, 25]], no: [] });
  });

  describe("KalshiClient", () => {
    test("getInstruments queries each mapped series", async () => {
      const fetchMock = stubFetch(() => jsonResponse({ markets: [rawMarket()], cursor: "" }));
      const client = new KalshiClient({ host: "https://kalshi.test/" });

      const instruments = await client.getInstruments({ categories: ["basketball_nba", "cricket"] });

      expect(instruments.map((i) => i.id)).toEqual(["KXNBAGAME-26FEB01OKCDEN-OKC"]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(String(fetchMock.mock.calls[0][0])).toBe(
        "https://kalshi.test/trade-api/v2/markets?series_ticker=KXNBAGAME&status=open&limit=500"
      );
    });

    test("getOrderbook implies asks from the opposite bids", async () => {
      stubFetch(() => jsonResponse({ orderbook: { yes: [[35, 10], [42, 25]], no: [[56, 30]] } }));
      const client = new KalshiClient({ host: "https://kalshi.test", clock: () => 1234 });

      const book = await client.getOrderbook("KXNBAGAME-26FEB01OKCDEN-OKC");

      expect(book.ts).toBe(1234);
      expect(book.sides.A).toEqual({ bid: 0.42, bidSize: 25, ask: 0.44, askSize: 30 });
      expect(book.sides.B).toEqual({ bid: 0.56, bidSize: 30, ask: 0.58, askSize: 25 });
    });
  });
});

describe("fetchJson", () => {
  test("429 becomes RateLimitedError with the venue hint", async () => {
    stubFetch(() => jsonResponse({}, 429, { "Retry-After": "2" }));
    const error = await fetchJson("https://venue.test/x", { venue: "kalshi", timeoutMs: 1000 }).catch(
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(2000);
  });

  test("5xx and network failures are transient", async () => {
    stubFetch(() => jsonResponse({}, 503));
    await expect(fetchJson("https://venue.test/x", { venue: "kalshi", timeoutMs: 1000 })).rejects.toBeInstanceOf(
      TransientVenueError
    );

    vi.stubGlobal("fetch", vi.fn(() => Promise.reject(new Error("ECONNRESET"))));
    await expect(fetchJson("https://venue.test/x", { venue: "kalshi", timeoutMs: 1000 })).rejects.toBeInstanceOf(
      TransientVenueError
    );
  });

  test("other client errors are not retryable", async () => {
    stubFetch(() => jsonResponse({}, 404));
    const error = await fetchJson("https://venue.test/x", { venue: "kalshi", timeoutMs: 1000 }).catch(
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(ArbitrageEngineError);
    expect(error).not.toBeInstanceOf(TransientVenueError);
    expect(error instanceof ArbitrageEngineError && error.code).toBe("VENUE_HTTP_ERROR");
  });

  test("a body that stalls is cut off by the timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn((_input: string | URL | Request, init?: RequestInit) => {
        const body = new ReadableStream<Uint8Array>({
          start(stream) {
            init?.signal?.addEventListener("abort", () => stream.error(new Error("aborted")));
          },
        });
        return Promise.resolve(new Response(body, { status: 200 }));
      })
    );

    const error = await fetchJson("https://venue.test/x", { venue: "kalshi", timeoutMs: 20 }).catch(
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(TransientVenueError);
    expect(error instanceof TransientVenueError ? error.message : "").toMatch(
      /^kalshi sent an unreadable body/
    );
  });

  test("parseRetryAfter", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    expect(parseRetryAfter(null)).toBe(1000);
    expect(parseRetryAfter("soon")).toBe(1000);
  });
});

describe("odds api", () => {
  const event: OddsApiEventRaw = {
    id: "evt1",
    sport_key: "basketball_nba",
    commence_time: "2026-02-02T03:00:00Z",
    home_team: "Denver Nuggets",
    away_team: "Oklahoma City Thunder",
    bookmakers: [
      {
        key: "draftkings",
        title: "DraftKings",
        markets: [
          {
            key: "h2h",
            outcomes: [
              { name: "Denver Nuggets", price: 130 },
              { name: "Oklahoma City Thunder", price: -155 },
            ],
          },
          {
            key: "spreads",
            outcomes: [
              { name: "Denver Nuggets", price: -110, point: 3.5 },
              { name: "Oklahoma City Thunder", price: -110, point: -3.5 },
            ],
          },
        ],
      },
      {
        key: "fanduel",
        title: "FanDuel",
        markets: [
          {
            key: "h2h",
            outcomes: [
              { name: "Denver Nuggets", price: 50 },
              { name: "Oklahoma City Thunder", price: -150 },
            ],
          },
          {
            key: "h2h_lay",
            outcomes: [
              { name: "Denver Nuggets", price: 120 },
              { name: "Oklahoma City Thunder", price: -140 },
            ],
          },
        ],
      },
    ],
  };

  test("parseOddsEvents emits one line per bookmaker and market", () => {
    const lines = parseOddsEvents([event], 5000);

    expect(lines.map((line) => line.id)).toEqual([
      "evt1:draftkings:h2h",
      "evt1:draftkings:spreads",
    ]);
    expect(lines[0]).toEqual({
      id: "evt1:draftkings:h2h",
      venue: "draftkings",
      eventId: "evt1",
      category: "basketball_nba",
      homeTeam: "Denver Nuggets",
      awayTeam: "Oklahoma City Thunder",
      startTime: Date.parse("2026-02-02T03:00:00Z"),
      marketType: "moneyline",
      outcomes: [
        { name: "Denver Nuggets", price: 130 },
        { name: "Oklahoma City Thunder", price: -155 },
      ],
      ts: 5000,
    });
    expect(lines[1].marketType).toBe("spread");
    expect(lines[1].outcomes[0].point).toBe(3.5);
  });

  test("parseEventsResponse drops malformed events", () => {
    expect(parseEventsResponse([event, { id: "bad" }])).toHaveLength(1);
    expect(parseEventsResponse({ message: "error" })).toEqual([]);
  });

  test("OddsApiClient tracks credits and refuses when nearly exhausted", async () => {
    const fetchMock = stubFetch(() => jsonResponse([event], 200, { "x-requests-remaining": "5" }));
    const client = new OddsApiClient({ apiKey: "test-key", host: "https://odds.test", clock: () => 7 });

    const lines = await client.getLines("basketball_nba", ["us"], ["moneyline"]);
    expect(lines).toHaveLength(2);
    expect(lines[0].ts).toBe(7);
    expect(client.credits).toBe(5);

    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.pathname).toBe("/v4/sports/basketball_nba/odds");
    expect(url.searchParams.get("markets")).toBe("h2h");
    expect(url.searchParams.get("oddsFormat")).toBe("american");

    const error = await client.getLines("basketball_nba", ["us"], ["moneyline"]).catch((e: unknown) => e);
    expect(error instanceof ArbitrageEngineError && error.code).toBe("CREDITS_EXHAUSTED");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test("OddsApiClient reports the credits each request used", async () => {
    stubFetch(() =>
      jsonResponse([event], 200, { "x-requests-remaining": "480", "x-requests-last": "3" })
    );
    const used: number[] = [];
    const client = new OddsApiClient({
      apiKey: "test-key",
      host: "https://odds.test",
      onCreditsUsed: (credits) => used.push(credits),
    });

    await client.getLines("basketball_nba", ["us"], ["moneyline", "spread", "total"]);

    expect(used).toEqual([3]);
    expect(client.credits).toBe(480);
  });
});
