import type { GenerationClient, GenerationRequest } from "./generation.js";
import type { RunLogger } from "./logger.js";

export const DEFAULT_MIN_LINES = 20;

export type OutputCheck = { ok: true } | { ok: false; reason: string };

const CONVERSATIONAL_OPENER =
  /^(I've |I have |Here's |Here are|Here is|Below |The following |Sure|Let me|Certainly|Of course)/;
const META_COMMENTARY = /^The .+ (is ready|is complete|is done|has been)/;
const SUMMARY_HEADER = /^Summary (of|:)/;
const PERMISSION_REQUEST =
  /(please approve|file write permission|approve the|permission to write|ready to write)/i;

export function firstContentLine(text: string): string {
  for (const line of text.split("\n")) {
    if (line.trim().length > 0) return line.replace(/\r$/, "");
  }
  return "";
}

function preview(line: string): string {
  return line.length > 60 ? `${line.slice(0, 60)}...` : line;
}

export function isConversationalOpener(line: string): boolean {
  return CONVERSATIONAL_OPENER.test(line);
}

/**
 * Detect output that talks about the requested document instead of being it:
 * too short, a chatty opener, meta-commentary, or a request for permissions.
 */
export function checkGeneratedOutput(
  output: string,
  minLines: number = DEFAULT_MIN_LINES,
): OutputCheck {
  const lineCount = output.split("\n").length;
  if (lineCount < minLines) {
    return {
      ok: false,
      reason: `output too short (${lineCount} lines, minimum ${minLines})`,
    };
  }

  const first = firstContentLine(output);
  if (isConversationalOpener(first)) {
    return { ok: false, reason: `conversational preamble detected: '${preview(first)}'` };
  }
  if (META_COMMENTARY.test(first)) {
    return { ok: false, reason: `meta-commentary detected: '${preview(first)}'` };
  }
  if (SUMMARY_HEADER.test(first)) {
    return { ok: false, reason: `summary header detected: '${preview(first)}'` };
  }
  if (PERMISSION_REQUEST.test(output)) {
    return {
      ok: false,
      reason: "permission request detected instead of content",
    };
  }

  return { ok: true };
}

export function buildCorrectivePrompt(
  output: string,
  originalPrompt: string,
): string {
  const lineCount = output.split("\n").length;
  const first = firstContentLine(output).slice(0, 80);

  return `Your previous response was a conversational summary (${lineCount} lines starting with: '${first}'). That is NOT what was requested. Output the COMPLETE content as specified in the original prompt. Start DIRECTLY with the content: no introductory text, no explanations, no preamble.

---

ORIGINAL PROMPT:

${originalPrompt}`;
}

/**
 * Generate, and if the result fails the output check, re-prompt once with a
 * corrective instruction. A second failing check is logged and accepted.
 * GenerationError from either call propagates unchanged.
 */
export function generateChecked(
  generator: GenerationClient,
  request: GenerationRequest,
  logger: RunLogger,
  minLines: number = DEFAULT_MIN_LINES,
): string {
  const output = generator.generate(request);
  const check = checkGeneratedOutput(output, minLines);
  if (check.ok) return output;

  logger.info(`Output check failed for ${request.description}: ${check.reason}`);
  logger.info(`Re-generating ${request.description} with an explicit content instruction`);

  const corrected = generator.generate({
    ...request,
    prompt: buildCorrectivePrompt(output, request.prompt),
    description: `${request.description} (corrective)`,
  });

  const recheck = checkGeneratedOutput(corrected, minLines);
  if (!recheck.ok) {
    logger.warn(
      `Corrected output for ${request.description} still fails the output check (${recheck.reason}); proceeding`,
    );
  }
  return corrected;
}
