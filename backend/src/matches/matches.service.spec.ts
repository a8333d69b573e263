import { BadRequestException, NotFoundException } from "@nestjs/common";
import { Test } from "@nestjs/testing";

import { CricbuzzClient } from "../cricbuzz/cricbuzz.client";
import { MatchesService } from "./matches.service";

describe("MatchesService", () => {
  const cricbuzz = {
    getLiveMatches: jest.fn(),
    getScorecard: jest.fn(),
  };

  let service: MatchesService;

  beforeEach(async () => {
    jest.resetAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [MatchesService, { provide: CricbuzzClient, useValue: cricbuzz }],
    }).compile();

    service = moduleRef.get(MatchesService);
  });

  it("returns 404 when the match has no scorecard yet", async () => {
    cricbuzz.getScorecard.mockResolvedValue({ scorecard: [] });

    await expect(service.getScorecard(3)).rejects.toBeInstanceOf(NotFoundException);
  });

  it("parses a scorecard for the requested match", async () => {
    cricbuzz.getScorecard.mockResolvedValue({
      scorecard: [{ inningsid: 1, batteamname: "Owls", score: 140, wickets: 10 }],
    });

    const card = await service.getScorecard(3);

    expect(cricbuzz.getScorecard).toHaveBeenCalledWith(3);
    expect(card.summary).toHaveLength(1);
    expect(card.summary[0]).toMatchObject({ matchId: 3, team: "Owls", score: 140, wickets: 10 });
    expect(card.batting).toEqual([]);
  });

  it("rejects match ids below 1 without calling the API", async () => {
    await expect(service.getScorecard(0)).rejects.toBeInstanceOf(BadRequestException);
    expect(cricbuzz.getScorecard).not.toHaveBeenCalled();
  });
});
