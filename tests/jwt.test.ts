import jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";
import { UnauthorizedError } from "../src/infra/app-error.js";
import { signJwt, verifyJwt } from "../src/infra/jwt.js";

const SECRET = "test-secret";
const NOW_SECONDS = 1_767_225_600;

function verificationError(token: string): unknown {
  try {
    verifyJwt(token, SECRET, NOW_SECONDS);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("verifyJwt", () => {
  it("returns the claims of a valid token", () => {
    const token = signJwt({ sub: "user-1", iat: NOW_SECONDS, exp: NOW_SECONDS + 60 }, SECRET);

    expect(verifyJwt(token, SECRET, NOW_SECONDS)).toEqual({
      sub: "user-1",
      iat: NOW_SECONDS,
      exp: NOW_SECONDS + 60,
    });
  });

  it("accepts tokens without an expiry", () => {
    expect(verifyJwt(signJwt({ sub: "user-1" }, SECRET), SECRET, NOW_SECONDS)).toEqual({ sub: "user-1" });
  });

  it("rejects expired tokens", () => {
    const token = signJwt({ sub: "user-1", exp: NOW_SECONDS }, SECRET);

    expect(verificationError(token)).toMatchObject({ code: "token_expired", statusCode: 401 });
  });

  it("rejects tokens signed with another secret", () => {
    const token = signJwt({ sub: "user-1" }, "another-secret");

    expect(verificationError(token)).toMatchObject({ code: "invalid_token" });
  });

  it("only accepts HS256 signatures", () => {
    const token = jwt.sign({ sub: "user-1" }, SECRET, { algorithm: "HS512", noTimestamp: true });

    expect(verificationError(token)).toMatchObject({ code: "invalid_token" });
  });

  it("rejects tampered payloads", () => {
    const [header, , signature] = signJwt({ sub: "user-1" }, SECRET).split(".");
    const forgedPayload = Buffer.from(JSON.stringify({ sub: "admin" })).toString("base64url");

    expect(() => verifyJwt(`${header}.${forgedPayload}.${signature}`, SECRET, NOW_SECONDS)).toThrowError(
      UnauthorizedError,
    );
  });

  it("rejects malformed tokens", () => {
    for (const token of ["", "abc", "a.b", "a.b.c.d", "not-json.not-json.sig"]) {
      expect(verificationError(token)).toMatchObject({ code: "invalid_token" });
    }
  });
});
