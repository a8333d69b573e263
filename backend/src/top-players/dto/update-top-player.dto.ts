import { IsInt, IsNumber, Max, Min, ValidateIf } from "class-validator";

import { MAX_AVERAGE, MAX_INT } from "./column-limits";

// Skip validation only when the field is absent; null must fail
const present = (_: object, value: unknown) => value !== undefined;

/**
 * Only the batting totals are editable; identity fields stay fixed.
 */
export class UpdateTopPlayerDto {
  @ValidateIf(present)
  @IsInt()
  @Min(0)
  @Max(MAX_INT)
  runs?: number;

  @ValidateIf(present)
  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @Max(MAX_AVERAGE)
  average?: number;

  @ValidateIf(present)
  @IsInt()
  @Min(0)
  @Max(MAX_INT)
  hundred?: number;
}
