/**
 * Research request model
 */

import { InvalidRequestError } from "../errors";

export const MAX_SUBJECT_LENGTH = 200;
export const MAX_ROLE_TITLE_LENGTH = 200;
export const MAX_CONTEXT_LENGTH = 10000;

/**
 * Immutable research request
 */
export interface ResearchRequest {
  readonly subject: string; // Company to research
  readonly roleTitle?: string; // Target role, if the research is for a job application
  readonly context?: string; // Free-form context such as a job description
}

/**
 * Raw request input (HTTP body, CLI flags)
 */
export interface NewResearchRequest {
  subject: string;
  roleTitle?: string | null;
  context?: string | null;
}

function optionalText(
  field: string,
  value: string | null | undefined,
  maxLength: number
): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  if (trimmed.length > maxLength) {
    throw new InvalidRequestError(
      `${field} must be at most ${maxLength} characters`,
      { field, length: trimmed.length }
    );
  }
  return trimmed;
}

/**
 * Validate raw input and build a frozen ResearchRequest
 */
export function createResearchRequest(
  input: NewResearchRequest
): ResearchRequest {
  const subject = typeof input.subject === "string" ? input.subject.trim() : "";
  if (subject.length === 0) {
    throw new InvalidRequestError("Subject must not be empty", {
      field: "subject",
    });
  }
  if (subject.length > MAX_SUBJECT_LENGTH) {
    throw new InvalidRequestError(
      `Subject must be at most ${MAX_SUBJECT_LENGTH} characters`,
      { field: "subject", length: subject.length }
    );
  }

  const request: ResearchRequest = {
    subject,
    roleTitle: optionalText("roleTitle", input.roleTitle, MAX_ROLE_TITLE_LENGTH),
    context: optionalText("context", input.context, MAX_CONTEXT_LENGTH),
  };
  return Object.freeze(request);
}
