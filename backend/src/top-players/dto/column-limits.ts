// Upper bounds of the top_players columns (INTEGER, NUMERIC(8,2)).
// Larger values would be rejected by PostgreSQL as out of range.
export const MAX_INT = 2_147_483_647;
export const MAX_AVERAGE = 999_999.99;
