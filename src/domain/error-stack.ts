/**
 * Context stack shared by every catalog error.
 *
 * Each layer an error crosses adds one human-readable detail describing what
 * was being attempted. Details are kept oldest first and are never removed,
 * reordered or deduplicated.
 */

export interface ErrorStack {
  readonly contextStack: readonly string[];
  withDetail(detail: string): this;
  withDetails(details: Iterable<string>): this;
  appendDetail(detail: string): void;
  appendDetails(details: Iterable<string>): void;
}

export abstract class CatalogError extends Error implements ErrorStack {
  abstract readonly _tag: string;

  private readonly details: string[] = [];

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  get contextStack(): readonly string[] {
    return this.details;
  }

  withDetail(detail: string): this {
    this.details.push(detail);
    return this;
  }

  withDetails(details: Iterable<string>): this {
    this.details.push(...details);
    return this;
  }

  appendDetail(detail: string): void {
    this.details.push(detail);
  }

  appendDetails(details: Iterable<string>): void {
    this.details.push(...details);
  }
}

/** Renders a context stack as the `Stack:` block used in diagnostic output. */
export function renderContextStack(stack: readonly string[]): string {
  if (stack.length === 0) return '';
  return ['Stack:', ...stack.map(detail => `  ${detail}`)].join('\n') + '\n';
}
