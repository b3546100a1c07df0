import { NextRequest, NextResponse } from "next/server";
import { loadConfig, registryFromConfig } from "@/config";
import { errorResponse, json, readJsonBody } from "@/http";
import { logDebug } from "@/log";
import { scanUnit } from "@/scanner";
import { validateUnit } from "@/validate";

export const runtime = "nodejs";

export async function POST(request: NextRequest): Promise<NextResponse> {
  try {
    const config = loadConfig();
    const unit = validateUnit(await readJsonBody(request, config.maxBodyBytes));
    const scanned = scanUnit(unit, registryFromConfig(config));

    logDebug(
      `scanned ${unit.pgm_name}/${unit.inc_name}: ${scanned.findings?.length ?? 0} finding(s)`,
    );

    return json(scanned);
  } catch (error: unknown) {
    return errorResponse(error);
  }
}
