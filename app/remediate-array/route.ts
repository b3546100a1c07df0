import { NextRequest, NextResponse } from "next/server";
import { loadConfig, registryFromConfig } from "@/config";
import { errorResponse, json, readJsonBody } from "@/http";
import { logDebug } from "@/log";
import { scanUnits, summarizeFindings, withFindingsOnly } from "@/scanner";
import { validateUnits } from "@/validate";

export const runtime = "nodejs";

export async function POST(request: NextRequest): Promise<NextResponse> {
  try {
    const config = loadConfig();
    const units = validateUnits(await readJsonBody(request, config.maxBodyBytes));
    const flagged = withFindingsOnly(scanUnits(units, registryFromConfig(config)));

    const summary = summarizeFindings(flagged);
    logDebug(
      `scanned ${units.length} unit(s): ${summary.units} flagged, ${summary.findings} finding(s)`,
    );

    return json(flagged);
  } catch (error: unknown) {
    return errorResponse(error);
  }
}
