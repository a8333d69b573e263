import { Type } from "class-transformer";
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from "class-validator";

export const SORT_COLUMNS = ["id", "name"] as const;
export type SortColumn = (typeof SORT_COLUMNS)[number];

export class ListTopPlayersQuery {
  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsIn(SORT_COLUMNS)
  sort: SortColumn = "id";
}

export class LeadersQuery {
  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(50)
  limit: number = 10;
}
