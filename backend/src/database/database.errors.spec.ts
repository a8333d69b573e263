import {
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
  ServiceUnavailableException,
} from "@nestjs/common";
import { isConnectionError, toHttpError } from "./database.errors";

function pgError(code: string, message = "boom") {
  return Object.assign(new Error(message), { code });
}

describe("toHttpError", () => {
  it("maps a unique violation to 409", () => {
    const err = toHttpError(pgError("23505"), "Insert");
    expect(err).toBeInstanceOf(ConflictException);
    expect(err.message).toBe("Insert failed: a record with the same key already exists");
  });

  it("maps connection failures to 503", () => {
    expect(toHttpError(pgError("ECONNREFUSED"), "Query")).toBeInstanceOf(ServiceUnavailableException);
    expect(toHttpError(pgError("08006"), "Query")).toBeInstanceOf(ServiceUnavailableException);
  });

  it("wraps anything else as a 500 carrying the driver message", () => {
    const err = toHttpError(pgError("42P01", 'relation "venues" does not exist'), "Query q4");
    expect(err).toBeInstanceOf(InternalServerErrorException);
    expect(err.message).toBe('Query q4 failed: relation "venues" does not exist');
  });

  it("passes HTTP exceptions through untouched", () => {
    const original = new NotFoundException("nope");
    expect(toHttpError(original, "Update")).toBe(original);
  });
});

describe("isConnectionError", () => {
  it("ignores errors without a string code", () => {
    expect(isConnectionError(new Error("x"))).toBe(false);
    expect(isConnectionError({ code: 42 })).toBe(false);
    expect(isConnectionError(pgError("ENOTFOUND"))).toBe(true);
  });
});
