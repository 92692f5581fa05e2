export const PRIORITIES = ["High", "Medium", "Low"] as const;
export type Priority = (typeof PRIORITIES)[number];

/** Categories the prompt suggests; the model may still answer with another one. */
export const SUGGESTED_CATEGORIES = [
  "Work",
  "Personal",
  "Finance",
  "Shopping",
  "Travel",
  "Newsletter",
  "Promotions",
  "Social",
  "Spam",
  "Other",
] as const;

export const DEFAULT_CATEGORY = "Uncategorized";
export const DEFAULT_PRIORITY: Priority = "Medium";
export const FAILED_SUMMARY = "Processing failed";

export type AnalysisField = "category" | "priority" | "summary" | "replyNeeded" | "actionItems";

export interface MessageAnalysis {
  category: string;
  priority: Priority;
  summary: string;
  replyNeeded: boolean;
  actionItems: string[];
}

export interface ParsedAnalysis extends MessageAnalysis {
  /** Sections absent from the reply; their fields hold defaults. */
  missing: AnalysisField[];
  /** Sections present but with a value outside the grammar. */
  invalid: AnalysisField[];
}

export interface ProcessedResult extends MessageAnalysis {
  id: string;
  subject: string;
  sender: string;
  date: string;
  /** Set only when the message could not be analyzed. */
  error?: string;
}
