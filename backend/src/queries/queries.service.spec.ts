import { NotFoundException } from "@nestjs/common";
import { Test } from "@nestjs/testing";

import { DatabaseService } from "../database/database.service";
import { QUERY_CATALOG } from "./queries.catalog";
import { QueriesService } from "./queries.service";

describe("QueriesService", () => {
  const query = jest.fn();
  let service: QueriesService;

  beforeEach(async () => {
    query.mockReset();

    const moduleRef = await Test.createTestingModule({
      providers: [QueriesService, { provide: DatabaseService, useValue: { query } }],
    }).compile();

    service = moduleRef.get(QueriesService);
  });

  it("lists the whole catalogue with unique ids", () => {
    const list = service.list();

    expect(list).toHaveLength(16);
    expect(list[0]).toEqual({ id: "q1", title: "Indian Players — Name, Role & Styles" });
    expect(new Set(list.map((q) => q.id)).size).toBe(16);
  });

  it("runs the selected query without parameters", async () => {
    query.mockResolvedValue({
      rows: [{ ground: "Harbour Oval", city: "Port Test", country: "Nowhere", capacity: 42000 }],
      columns: ["ground", "city", "country", "capacity"],
      rowCount: 1,
    });

    const result = await service.run("q4");

    expect(query).toHaveBeenCalledWith(QUERY_CATALOG[3].sql, [], "Query q4");
    expect(result).toEqual({
      id: "q4",
      title: "Venues with 30,000+ Capacity",
      columns: ["ground", "city", "country", "capacity"],
      rows: [{ ground: "Harbour Oval", city: "Port Test", country: "Nowhere", capacity: 42000 }],
      rowCount: 1,
    });
  });

  it("keeps column names for empty results", async () => {
    query.mockResolvedValue({ rows: [], columns: ["role", "count"], rowCount: 0 });

    await expect(service.run("q6")).resolves.toMatchObject({ columns: ["role", "count"], rows: [] });
  });

  it("rejects unknown ids without touching the database", async () => {
    await expect(service.run("q99")).rejects.toBeInstanceOf(NotFoundException);
    expect(query).not.toHaveBeenCalled();
  });

  it("keeps backslashes in regular expressions", () => {
    const q7 = QUERY_CATALOG.find((q) => q.id === "q7");
    expect(q7?.sql).toContain("highest ~ '^\\d+'");
  });
});
