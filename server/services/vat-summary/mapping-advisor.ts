/**
 * Optional header-mapping hint
 *
 * An advisor may suggest canonical fields for headers the static alias table
 * does not know. It is advisory only: the call is bounded by a timeout, its
 * output is validated, and any failure leaves the sheet to the static table.
 */

import { z } from "zod";
import { CANONICAL_FIELDS, type CanonicalField } from "@shared/constants";

export interface MappingAdvisorRequest {
  sheet: string;
  /** Cleaned headers that did not resolve to a canonical field */
  headers: string[];
  signal: AbortSignal;
}

export interface MappingAdvisor {
  readonly name: string;
  suggestMappings(request: MappingAdvisorRequest): Promise<unknown>;
}

const suggestionSchema = z.record(z.string(), z.enum(CANONICAL_FIELDS));

export class MappingHintTimeoutError extends Error {
  constructor(advisor: string, timeoutMs: number) {
    super(`Mapping hint from ${advisor} timed out after ${timeoutMs}ms`);
    this.name = 'MappingHintTimeoutError';
  }
}

/**
 * Ask the advisor for aliases, racing it against the timeout. Suggestions
 * for headers that were not asked about are dropped.
 */
export async function requestMappingHint(
  advisor: MappingAdvisor,
  sheet: string,
  headers: string[],
  timeoutMs: number
): Promise<Record<string, CanonicalField>> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new MappingHintTimeoutError(advisor.name, timeoutMs));
    }, timeoutMs);
  });

  try {
    const raw = await Promise.race([
      advisor.suggestMappings({ sheet, headers, signal: controller.signal }),
      timeout,
    ]);
    const suggestions = suggestionSchema.parse(raw);
    const asked = new Set(headers);
    return Object.fromEntries(
      Object.entries(suggestions).filter(([header]) => asked.has(header))
    );
  } finally {
    clearTimeout(timer);
  }
}
