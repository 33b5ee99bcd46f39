/**
 * Finding model
 */

export interface SourceCitation {
  url: string;
  title?: string;
}

/**
 * One atomic piece of discovered information
 */
export interface Finding {
  readonly content: string;
  readonly source?: SourceCitation;
  readonly timestamp: number; // Milliseconds since epoch
  readonly iteration: number; // 1-based task unit invocation that produced it
}
