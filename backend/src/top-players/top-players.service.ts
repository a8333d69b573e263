// src/top-players/top-players.service.ts
// CRUD over the top_players table. Every statement is parameterized; the
// only interpolated fragment is an ORDER BY column picked from a whitelist.

import { BadRequestException, Injectable, Logger, NotFoundException } from "@nestjs/common";

import { DatabaseService } from "../database/database.service";
import { MAX_INT } from "./dto/column-limits";
import { CreateTopPlayerDto } from "./dto/create-top-player.dto";
import { SortColumn } from "./dto/list-top-players.query";
import { UpdateTopPlayerDto } from "./dto/update-top-player.dto";
import {
  DeletedTopPlayer,
  LeaderEntry,
  Leaders,
  TopPlayer,
  TopPlayerRow,
  toTopPlayer,
} from "./top-player.types";

const COLUMNS =
  "id, player_id, name, matches_played, innings_batted, runs, average, hundred";

const ORDER_BY: Record<SortColumn, string> = {
  id: "id",
  name: "name, id",
};

/**
 * Escapes LIKE wildcards so the filter matches the text literally.
 * Backslash is PostgreSQL's default LIKE escape character.
 */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (c) => `\\${c}`);
}

// ILIKE pattern for a substring filter, or null for "no filter"
function namePattern(nameFilter: string | undefined): string | null {
  const filter = nameFilter?.trim();
  return filter ? `%${escapeLike(filter)}%` : null;
}

// player_id is an INTEGER column; reject ids it cannot hold before querying
function checkPlayerId(playerId: number) {
  if (!Number.isInteger(playerId) || playerId < 1 || playerId > MAX_INT) {
    throw new BadRequestException(`playerId must be an integer between 1 and ${MAX_INT}`);
  }
}

@Injectable()
export class TopPlayersService {
  private readonly logger = new Logger(TopPlayersService.name);

  constructor(private readonly db: DatabaseService) {}

  async list(nameFilter: string | undefined, sort: SortColumn = "id"): Promise<TopPlayer[]> {
    const pattern = namePattern(nameFilter);

    const { rows } = await this.db.query<TopPlayerRow>(
      `SELECT ${COLUMNS} FROM top_players
       WHERE ($1::text IS NULL OR name ILIKE $1)
       ORDER BY ${ORDER_BY[sort]}`,
      [pattern],
      "Load players"
    );
    return rows.map(toTopPlayer);
  }

  /**
   * Top `limit` players by runs and by hundreds, over the same rows `list`
   * returns for `nameFilter`.
   */
  async leaders(limit = 10, nameFilter?: string): Promise<Leaders> {
    const pattern = namePattern(nameFilter);

    const byRuns = await this.db.query<LeaderEntry>(
      `SELECT name, COALESCE(runs, 0) AS value FROM top_players
       WHERE ($2::text IS NULL OR name ILIKE $2)
       ORDER BY runs DESC NULLS LAST, name
       LIMIT $1`,
      [limit, pattern],
      "Load leaders"
    );
    const byHundreds = await this.db.query<LeaderEntry>(
      `SELECT name, COALESCE(hundred, 0) AS value FROM top_players
       WHERE ($2::text IS NULL OR name ILIKE $2)
       ORDER BY hundred DESC NULLS LAST, name
       LIMIT $1`,
      [limit, pattern],
      "Load leaders"
    );

    return { byRuns: byRuns.rows, byHundreds: byHundreds.rows };
  }

  async get(playerId: number): Promise<TopPlayer> {
    checkPlayerId(playerId);
    const { rows } = await this.db.query<TopPlayerRow>(
      `SELECT ${COLUMNS} FROM top_players WHERE player_id = $1`,
      [playerId],
      "Load player"
    );
    if (rows.length === 0) {
      throw new NotFoundException(`No player with player_id ${playerId}`);
    }
    return toTopPlayer(rows[0]);
  }

  async create(dto: CreateTopPlayerDto): Promise<TopPlayer> {
    const { rows } = await this.db.query<TopPlayerRow>(
      `INSERT INTO top_players (player_id, name, matches_played, innings_batted, runs, average, hundred)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${COLUMNS}`,
      [
        dto.playerId,
        dto.name,
        dto.matchesPlayed,
        dto.inningsBatted,
        dto.runs,
        dto.average,
        dto.hundred,
      ],
      "Insert"
    );

    this.logger.log(`Player '${dto.name}' (${dto.playerId}) added`);
    return toTopPlayer(rows[0]);
  }

  async update(playerId: number, dto: UpdateTopPlayerDto): Promise<TopPlayer> {
    checkPlayerId(playerId);
    if (dto.runs == null && dto.average == null && dto.hundred == null) {
      throw new BadRequestException("Nothing to update: provide runs, average or hundred");
    }

    // COALESCE keeps the stored value for fields left out of the payload
    const { rows } = await this.db.query<TopPlayerRow>(
      `UPDATE top_players
       SET runs = COALESCE($2, runs),
           average = COALESCE($3, average),
           hundred = COALESCE($4, hundred)
       WHERE player_id = $1
       RETURNING ${COLUMNS}`,
      [playerId, dto.runs ?? null, dto.average ?? null, dto.hundred ?? null],
      "Update"
    );
    if (rows.length === 0) {
      throw new NotFoundException(`No player with player_id ${playerId}`);
    }

    this.logger.log(`Player ${playerId} updated`);
    return toTopPlayer(rows[0]);
  }

  async remove(playerId: number): Promise<DeletedTopPlayer> {
    checkPlayerId(playerId);
    const { rows } = await this.db.query<Pick<TopPlayerRow, "player_id" | "name">>(
      `DELETE FROM top_players WHERE player_id = $1 RETURNING player_id, name`,
      [playerId],
      "Delete"
    );
    if (rows.length === 0) {
      throw new NotFoundException(`No player with player_id ${playerId}`);
    }

    this.logger.log(`Player '${rows[0].name}' (${playerId}) deleted`);
    return { deleted: true, playerId: rows[0].player_id, name: rows[0].name };
  }
}
