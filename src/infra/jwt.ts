import jwt, { type JwtPayload } from "jsonwebtoken";
import { UnauthorizedError } from "./app-error.js";

export interface AccessTokenClaims {
  sub?: string;
  exp?: number;
  iat?: number;
}

const ALGORITHM = "HS256";

export function signJwt(claims: AccessTokenClaims, secret: string): string {
  return jwt.sign({ ...claims }, secret, { algorithm: ALGORITHM, noTimestamp: claims.iat === undefined });
}

/** HS256 only; `nowSeconds` is compared against `exp`. */
export function verifyJwt(token: string, secret: string, nowSeconds: number): AccessTokenClaims {
  let payload: string | JwtPayload;
  try {
    payload = jwt.verify(token, secret, { algorithms: [ALGORITHM], clockTimestamp: nowSeconds });
  } catch (error) {
    throw mapVerificationError(error);
  }

  if (typeof payload === "string" || (payload.sub !== undefined && typeof payload.sub !== "string")) {
    throw new UnauthorizedError("invalid_token", "Invalid token.");
  }

  const verified: AccessTokenClaims = {};
  if (payload.sub !== undefined) {
    verified.sub = payload.sub;
  }
  if (payload.exp !== undefined) {
    verified.exp = payload.exp;
  }
  if (payload.iat !== undefined) {
    verified.iat = payload.iat;
  }
  return verified;
}

function mapVerificationError(error: unknown): Error {
  if (error instanceof jwt.TokenExpiredError) {
    return new UnauthorizedError("token_expired", "Token has expired.");
  }
  if (error instanceof jwt.JsonWebTokenError) {
    return new UnauthorizedError("invalid_token", "Invalid token.");
  }
  return error instanceof Error ? error : new Error(String(error));
}
