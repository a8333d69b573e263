import { Injectable, NotFoundException } from "@nestjs/common";

import { DatabaseService } from "../database/database.service";
import { CannedQuery, QUERY_CATALOG } from "./queries.catalog";

export type QuerySummary = Pick<CannedQuery, "id" | "title">;

export type QueryResult = QuerySummary & {
  columns: string[];
  rows: Record<string, unknown>[];
  rowCount: number;
};

@Injectable()
export class QueriesService {
  constructor(private readonly db: DatabaseService) {}

  list(): QuerySummary[] {
    return QUERY_CATALOG.map(({ id, title }) => ({ id, title }));
  }

  async run(id: string): Promise<QueryResult> {
    const query = QUERY_CATALOG.find((q) => q.id === id);
    if (!query) {
      throw new NotFoundException(`Unknown query '${id}'`);
    }

    const out = await this.db.query<Record<string, unknown>>(query.sql, [], `Query ${id}`);

    return {
      id: query.id,
      title: query.title,
      columns: out.columns,
      rows: out.rows,
      rowCount: out.rowCount,
    };
  }
}
