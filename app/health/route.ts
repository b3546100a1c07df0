import { NextResponse } from "next/server";
import { loadConfig, registryFromConfig } from "@/config";
import { errorResponse, json } from "@/http";
import { listRules } from "@/registry";
import { VERSION } from "@/version";

export const runtime = "nodejs";

export async function GET(): Promise<NextResponse> {
  try {
    const registry = registryFromConfig(loadConfig());

    return json({
      ok: true,
      rules: listRules(registry),
      version: VERSION,
    });
  } catch (error: unknown) {
    return errorResponse(error);
  }
}
