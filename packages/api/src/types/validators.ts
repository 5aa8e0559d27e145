/**
 * Submission Validators
 *
 * SECURITY: every field carries a maximum length and a character policy.
 * Each field reports at most one problem, checked in a fixed order.
 */

import { z } from "zod";

// ============================================================================
// STRING LENGTH LIMITS
// ============================================================================

export const STRING_LIMITS = {
  URL: { min: 1, max: 2048 },
  HOSTNAME: { max: 253 },
  CATEGORY_NAME: { min: 1, max: 100 },
} as const;

const CATEGORY_PATTERN = /^[a-zA-Z0-9\s\-_.,!?()]+$/;
const UNSAFE_URL_MARKERS = ["javascript:", "data:", "vbscript:", "file:", "ftp:"];
const UNSAFE_CATEGORY_MARKERS = [
  "<script",
  "</script",
  "javascript:",
  "onclick",
  "onerror",
  "onload",
];
const LOCAL_HOST_MARKERS = ["localhost", "127.0.0.1", "::1"];

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Strip NUL bytes and collapse runs of whitespace.
 */
export function sanitizeInput(input: string): string {
  return input.replace(/\0/g, "").replace(/\s+/g, " ").trim();
}

/**
 * First problem with a submitted page URL, or null when it is acceptable.
 */
export function urlProblem(value: string): string | null {
  if (!value) return "URL is required";
  if (value.length > STRING_LIMITS.URL.max) {
    return `URL is too long (maximum ${STRING_LIMITS.URL.max} characters)`;
  }
  if (!/^[a-z][a-z0-9+.-]*:/i.test(value)) {
    return "URL must include protocol (http:// or https://)";
  }

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return "invalid URL format";
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return "URL must use http or https protocol";
  }
  const host = parsed.host;
  if (!host) return "URL must include a valid domain";
  if (host.length > STRING_LIMITS.HOSTNAME.max) {
    return "domain name is too long";
  }

  const lower = value.toLowerCase();
  if (UNSAFE_URL_MARKERS.some((marker) => lower.includes(marker))) {
    return "URL contains potentially unsafe protocol";
  }
  if (LOCAL_HOST_MARKERS.some((marker) => host.includes(marker))) {
    return "local URLs are not allowed";
  }
  return null;
}

/**
 * First problem with a submitted category name, or null.
 */
export function categoryProblem(value: string): string | null {
  if (!value) return "Category is required";
  if (value.length > STRING_LIMITS.CATEGORY_NAME.max) {
    return `category name must be ${STRING_LIMITS.CATEGORY_NAME.max} characters or less`;
  }
  if (!CATEGORY_PATTERN.test(value)) {
    return "category name contains invalid characters (only letters, numbers, spaces, and basic punctuation allowed)";
  }
  const lower = value.toLowerCase();
  if (UNSAFE_CATEGORY_MARKERS.some((marker) => lower.includes(marker))) {
    return "category contains potentially unsafe content";
  }
  return null;
}

function checkedField(check: (value: string) => string | null) {
  return z
    .preprocess((value) => value ?? "", z.string())
    .transform(sanitizeInput)
    .superRefine((value, ctx) => {
      const problem = check(value);
      if (problem) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }
    });
}

// ============================================================================
// SUBMISSION
// ============================================================================

export const submissionSchema = z.object({
  url: checkedField(urlProblem),
  category: checkedField(categoryProblem),
  /** Checkbox ("true") or JSON boolean; absent defers to server config */
  single_url_mode: z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value) =>
      value === undefined ? undefined : value === true || value === "true"
    ),
});

export type Submission = z.infer<typeof submissionSchema>;

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Flatten zod issues into one `{ field, message }` entry per issue.
 */
export function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "body",
    message: issue.message,
  }));
}
