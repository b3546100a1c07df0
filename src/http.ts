import { NextRequest, NextResponse } from "next/server";
import { ApiError } from "./errors";
import { logError } from "./log";

export function json(data: unknown, status = 200): NextResponse {
  return NextResponse.json(data, {
    status,
    headers: {
      "cache-control": "no-store",
    },
  });
}

export async function readJsonBody(
  request: NextRequest,
  maxBytes: number,
): Promise<unknown> {
  const declared = Number.parseInt(request.headers.get("content-length") ?? "0", 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    throw tooLarge(maxBytes);
  }

  const text = await request.text();
  if (Buffer.byteLength(text, "utf8") > maxBytes) {
    throw tooLarge(maxBytes);
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new ApiError(400, "Invalid JSON body");
  }
}

function tooLarge(maxBytes: number): ApiError {
  return new ApiError(413, `Request body too large. Max supported size is ${maxBytes} bytes.`);
}

export function errorResponse(error: unknown): NextResponse {
  if (error instanceof ApiError) {
    return json({ error: error.message }, error.status);
  }

  logError("request failed:", error);
  const message = error instanceof Error ? error.message : "Unexpected error";
  return json({ error: message }, 500);
}
