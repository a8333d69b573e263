// src/database/database.errors.ts
// Maps node-postgres errors onto NestJS HTTP exceptions.

import {
  ConflictException,
  HttpException,
  InternalServerErrorException,
  ServiceUnavailableException,
} from "@nestjs/common";

// Network-level failures reported by the socket layer
const CONNECTION_CODES = new Set(["ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "ECONNRESET", "57P01"]);

function errorCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e) {
    return typeof e.code === "string" ? e.code : undefined;
  }
  return undefined;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function isConnectionError(e: unknown): boolean {
  const code = errorCode(e);
  if (!code) return false;
  // SQLSTATE class 08 = connection exception
  return CONNECTION_CODES.has(code) || code.startsWith("08");
}

/**
 * @param action - short verb phrase used in the message, e.g. "Insert"
 */
export function toHttpError(e: unknown, action: string): HttpException {
  if (e instanceof HttpException) return e;

  const code = errorCode(e);

  // unique_violation
  if (code === "23505") {
    return new ConflictException(`${action} failed: a record with the same key already exists`);
  }

  if (isConnectionError(e)) {
    return new ServiceUnavailableException("Database unavailable");
  }

  return new InternalServerErrorException(`${action} failed: ${errorMessage(e)}`);
}
