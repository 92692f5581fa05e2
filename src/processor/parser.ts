import { MalformedReplyError } from "../utils/errors.js";
import {
  DEFAULT_CATEGORY,
  DEFAULT_PRIORITY,
  type AnalysisField,
  type ParsedAnalysis,
  type Priority,
} from "./types.js";

/**
 * Reply grammar, one section per line, matched case-insensitively:
 *
 *   Category: <text>
 *   Priority: High | Medium | Low
 *   Summary: <text, may continue on following lines until a blank line>
 *   Reply Needed: Yes | No
 *   Action Items: None
 *   | Action Items:
 *     - <item>            (also "*", "•", "1." or "1)")
 *
 * Under Action Items every bullet line is an item, even one whose text starts
 * with a label. Markdown decoration around labels ("**Category:**",
 * "## Summary:", "1. Priority:") is tolerated. A reply with none of the sections is rejected; a reply missing
 * some of them gets defaults, and the gaps are reported in `missing`.
 */

const ALL_FIELDS: AnalysisField[] = ["category", "priority", "summary", "replyNeeded", "actionItems"];

const SECTION_PATTERN =
  /^[\s#>*_\d.)-]*(category|priority|summary|reply[ _-]?needed|action[ _-]?items?)[\s*_]*:(.*)$/i;

const BULLET_PATTERN = /^(?:[-*•+]|\d+[.)])\s+(.*)$/;

const NONE_PATTERN = /^(?:none|n\/a|na|nothing|no action items?(?: (?:required|needed))?|-)\.?$/i;

const PRIORITY_ALIASES = new Map<string, Priority>([
  ["high", "High"],
  ["urgent", "High"],
  ["critical", "High"],
  ["medium", "Medium"],
  ["normal", "Medium"],
  ["moderate", "Medium"],
  ["low", "Low"],
]);

export function parseAnalysis(reply: string): ParsedAnalysis {
  const lines = stripThinking(reply).replace(/\r\n?/g, "\n").split("\n");

  const found = new Map<AnalysisField, string>();
  const summaryLines: string[] = [];
  const actionItems: string[] = [];
  let state: "none" | "summary" | "actionItems" = "none";
  let sawBullet = false;

  for (const line of lines) {
    const section = matchSection(line);
    // "- Summary: send the report" under Action Items is an item, not a new section.
    const bulletedItem = state === "actionItems" && matchBullet(line) !== null;

    if (section && !bulletedItem) {
      state = "none";
      if (found.has(section.field)) continue;
      found.set(section.field, section.value);

      if (section.field === "summary") {
        if (section.value) summaryLines.push(section.value);
        state = "summary";
      } else if (section.field === "actionItems" && !isNoneMarker(section.value)) {
        if (section.value) {
          actionItems.push(matchBullet(section.value) ?? section.value);
          sawBullet = true;
        }
        state = "actionItems";
      }
      continue;
    }

    const trimmed = line.trim();

    if (state === "summary") {
      if (!trimmed) {
        if (summaryLines.length > 0) state = "none";
        continue;
      }
      summaryLines.push(stripEmphasis(trimmed));
    } else if (state === "actionItems") {
      if (!trimmed) {
        if (sawBullet) state = "none";
        continue;
      }
      const item = matchBullet(trimmed);
      if (item === null || (!sawBullet && isNoneMarker(item))) {
        state = "none";
        continue;
      }
      if (item) actionItems.push(item);
      sawBullet = true;
    }
  }

  if (found.size === 0) {
    throw new MalformedReplyError("Reply contains none of the expected sections", reply);
  }

  const missing = ALL_FIELDS.filter((field) => !found.has(field));
  const invalid: AnalysisField[] = [];

  const rawCategory = found.get("category");
  let category = rawCategory === undefined ? "" : cleanCategory(rawCategory);
  if (!category) {
    if (rawCategory !== undefined) invalid.push("category");
    category = DEFAULT_CATEGORY;
  }

  const rawPriority = found.get("priority");
  let priority = rawPriority === undefined ? null : normalizePriority(rawPriority);
  if (priority === null) {
    if (rawPriority !== undefined) invalid.push("priority");
    priority = DEFAULT_PRIORITY;
  }

  const rawReplyNeeded = found.get("replyNeeded");
  let replyNeeded = rawReplyNeeded === undefined ? null : parseYesNo(rawReplyNeeded);
  if (replyNeeded === null) {
    if (rawReplyNeeded !== undefined) invalid.push("replyNeeded");
    replyNeeded = false;
  }

  return {
    category,
    priority,
    summary: summaryLines.join(" ").trim(),
    replyNeeded,
    actionItems,
    missing,
    invalid,
  };
}

/** Drop the <think>…</think> preamble reasoning models emit. */
export function stripThinking(reply: string): string {
  return reply.replace(/<think>[\s\S]*?<\/think>/gi, "");
}

function matchSection(line: string): { field: AnalysisField; value: string } | null {
  const match = SECTION_PATTERN.exec(line);
  if (!match) return null;

  const label = (match[1] ?? "").toLowerCase().replace(/[ _-]/g, "");
  const value = stripEmphasis(match[2] ?? "");

  if (label === "category") return { field: "category", value };
  if (label === "priority") return { field: "priority", value };
  if (label === "summary") return { field: "summary", value };
  if (label === "replyneeded") return { field: "replyNeeded", value };
  return { field: "actionItems", value };
}

function matchBullet(line: string): string | null {
  const match = BULLET_PATTERN.exec(line.trim());
  if (!match) return null;
  return stripEmphasis((match[1] ?? "").replace(/^\[[ xX]?\]\s*/, ""));
}

function isNoneMarker(value: string): boolean {
  return NONE_PATTERN.test(value.trim());
}

function stripEmphasis(value: string): string {
  return value.replace(/^[\s*_`]+|[\s*_`]+$/g, "");
}

function cleanCategory(value: string): string {
  return value
    .replace(/\.$/, "")
    .replace(/^["'[(]+|["')\]]+$/g, "")
    .trim();
}

/** The leading word decides: "High (deadline Friday)" is High, "Not urgent" is unrecognized. */
function normalizePriority(value: string): Priority | null {
  const word = value.toLowerCase().match(/^[^a-z]*([a-z]+)/)?.[1];
  if (word === undefined) return null;
  return PRIORITY_ALIASES.get(word) ?? null;
}

function parseYesNo(value: string): boolean | null {
  const word = value.trim().toLowerCase().match(/^[a-z]+/)?.[0];
  if (word === "yes" || word === "true" || word === "y") return true;
  if (word === "no" || word === "false" || word === "n") return false;
  return null;
}
