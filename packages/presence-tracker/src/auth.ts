import jwt from "jsonwebtoken";

const FEED_AUDIENCE = "presence-feed";

export interface PresenceFeedClaims {
  realmId: string;
}

export class UnauthorizedError extends Error {
  constructor(message = "Unauthorized") {
    super(message);
    this.name = "UnauthorizedError";
  }
}

export function assertControlAuth(headerValue: string | undefined, expectedToken: string): void {
  const [scheme, token] = (headerValue ?? "").split(" ");
  if (scheme !== "Bearer" || token !== expectedToken) {
    throw new UnauthorizedError();
  }
}

export function mintPresenceFeedToken(claims: PresenceFeedClaims, secret: string, expiresInSec: number): string {
  return jwt.sign({ realmId: claims.realmId }, secret, {
    algorithm: "HS256",
    audience: FEED_AUDIENCE,
    expiresIn: expiresInSec,
  });
}

export function verifyPresenceFeedToken(token: string, secret: string): PresenceFeedClaims {
  const decoded = jwt.verify(token, secret, { algorithms: ["HS256"], audience: FEED_AUDIENCE });
  if (typeof decoded !== "object" || decoded === null) {
    throw new UnauthorizedError("Invalid feed token");
  }
  const realmId = decoded["realmId"];
  if (typeof realmId !== "string" || realmId.length === 0) {
    throw new UnauthorizedError("Invalid feed claims");
  }
  return { realmId };
}
