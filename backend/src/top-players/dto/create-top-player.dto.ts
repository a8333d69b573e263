import { Transform } from "class-transformer";
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from "class-validator";

import { MAX_AVERAGE, MAX_INT } from "./column-limits";

export class CreateTopPlayerDto {
  @IsInt()
  @Min(1)
  @Max(MAX_INT)
  playerId!: number;

  @Transform(({ value }) => (typeof value === "string" ? value.trim() : value))
  @IsString()
  @IsNotEmpty({ message: "Player name is required" })
  @MaxLength(120)
  name!: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_INT)
  matchesPlayed: number = 0;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_INT)
  inningsBatted: number = 0;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_INT)
  runs: number = 0;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(MAX_AVERAGE)
  average: number = 0;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_INT)
  hundred: number = 0;
}
