import { createHmac, timingSafeEqual } from "node:crypto";
import { AppError } from "./app-error.js";

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;
const RUN_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

interface PageCursorV1 {
  v: 1;
  run: string;
  offset: number;
}

function invalidCursor(message: string): AppError {
  return new AppError(422, "invalid_cursor", message);
}

function isPageCursor(value: unknown): value is PageCursorV1 {
  if (!value || typeof value !== "object" || !("v" in value) || !("run" in value) || !("offset" in value)) {
    return false;
  }
  const { v, run, offset } = value;
  return v === 1 && typeof run === "string" && typeof offset === "number" && Number.isInteger(offset) && offset >= 0;
}

/**
 * Signed page cursors over a run's tables. A cursor only decodes against the
 * run it was issued for, so pages never mix two runs.
 */
export class CursorTokenService {
  private readonly verificationSecrets: string[];

  constructor(
    private readonly signingSecret: string,
    verificationSecrets: string[] = [signingSecret],
  ) {
    this.verificationSecrets = [...new Set([signingSecret, ...verificationSecrets])];
  }

  encode(runId: string, offset: number): string {
    if (!RUN_ID_PATTERN.test(runId)) {
      throw invalidCursor("cursor run id contains invalid characters.");
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw invalidCursor("cursor offset must be a non-negative integer.");
    }
    const payload: PageCursorV1 = { v: 1, run: runId, offset };
    const payloadBase64Url = Buffer.from(JSON.stringify(payload), "utf8").toString("base64url");
    const signatureBase64Url = this.sign(payloadBase64Url, this.signingSecret);
    return `${payloadBase64Url}.${signatureBase64Url}`;
  }

  decode(token: string, expectedRunId: string): number {
    const parts = token.split(".");
    if (parts.length !== 2) {
      throw invalidCursor("cursor token format is invalid.");
    }
    const [payloadBase64Url, signatureBase64Url] = parts;
    if (!payloadBase64Url || !signatureBase64Url) {
      throw invalidCursor("cursor token format is invalid.");
    }
    if (!BASE64URL_PATTERN.test(payloadBase64Url) || !BASE64URL_PATTERN.test(signatureBase64Url)) {
      throw invalidCursor("cursor token contains invalid characters.");
    }

    const providedSignatureBuffer = Buffer.from(signatureBase64Url, "utf8");
    let isValidSignature = false;
    for (const secret of this.verificationSecrets) {
      const expectedSignature = this.sign(payloadBase64Url, secret);
      const expectedSignatureBuffer = Buffer.from(expectedSignature, "utf8");
      if (
        providedSignatureBuffer.length === expectedSignatureBuffer.length &&
        timingSafeEqual(providedSignatureBuffer, expectedSignatureBuffer)
      ) {
        isValidSignature = true;
        break;
      }
    }
    if (!isValidSignature) {
      throw invalidCursor("cursor token signature is invalid.");
    }

    let payload: unknown;
    try {
      payload = JSON.parse(Buffer.from(payloadBase64Url, "base64url").toString("utf8"));
    } catch {
      throw invalidCursor("cursor token payload is invalid.");
    }
    if (!isPageCursor(payload)) {
      throw invalidCursor("cursor token payload is invalid.");
    }
    if (payload.run !== expectedRunId) {
      throw new AppError(409, "stale_cursor", "cursor was issued for a different control run.");
    }
    return payload.offset;
  }

  private sign(payloadBase64Url: string, secret: string): string {
    return createHmac("sha256", secret).update(payloadBase64Url).digest("base64url");
  }
}
