/**
 * @file Type definitions for the selection engine.
 *
 * Catalog entries, match results and the tagged outcomes exchanged between
 * the scorer, the finder adapter, the manual prompt loop and the
 * orchestrator.
 *
 * @module
 */

/**
 * Environment variables as read from `process.env`.
 */
export type EnvMap = Record<string, string | undefined>;

/**
 * One selectable candidate.
 */
export interface CatalogEntry {
    /** Unique within a catalog; final tie-break when ranking. */
    readonly identifier: string;
    readonly primaryLabel: string;
    /** Help text or relative path. Empty string when absent. */
    readonly secondaryLabel: string;
}

/**
 * Immutable, ordered set of entries for one selection session.
 */
export type Catalog = readonly CatalogEntry[];

/**
 * Ranked match of a query against one entry.
 */
export interface MatchResult {
    /** Length of the minimal matching span. 0 for an empty query. */
    score: number;
    startOffset: number;
    entry: CatalogEntry;
}

// ─── Finder ──────────────────────────────────────────────────────────────────

export interface FinderOutcomeResolved {
    kind: 'resolved';
    entry: CatalogEntry;
}

export interface FinderOutcomeCancelled {
    kind: 'cancelled';
    exitCode: number;
}

export interface FinderOutcomeViolation {
    kind: 'violation';
    output: string;
}

export type FinderOutcome = FinderOutcomeResolved | FinderOutcomeCancelled | FinderOutcomeViolation;

/**
 * Capability-gated delegation to an external finder.
 * `null` means the finder does not apply (not installed or disabled).
 */
export interface FinderStrategy {
    finder_tryDelegate(catalog: Catalog, query: string): FinderOutcome | null;
}

// ─── Line input ──────────────────────────────────────────────────────────────

export interface LineReadLine {
    kind: 'line';
    text: string;
}

export interface LineReadInterrupted {
    kind: 'interrupted';
}

export type LineReadResult = LineReadLine | LineReadInterrupted;

/**
 * Blocking line source for the manual prompt loop.
 */
export interface LineReader {
    line_read(prompt: string): Promise<LineReadResult>;
    close(): void;
}

// ─── Manual loop ─────────────────────────────────────────────────────────────

export interface PromptOutcomeResolved {
    kind: 'resolved';
    entry: CatalogEntry;
}

export interface PromptOutcomeInterrupted {
    kind: 'interrupted';
}

export type PromptOutcome = PromptOutcomeResolved | PromptOutcomeInterrupted;

// ─── Orchestrator ────────────────────────────────────────────────────────────

export type SelectionState = 'INIT' | 'AUTO' | 'EXTERNAL' | 'MANUAL' | 'RESOLVED' | 'CANCELLED' | 'VIOLATION' | 'EMPTY';

export type ResolutionPath = 'auto' | 'finder' | 'manual';

export type CancelReason = 'finder' | 'interrupted';

export interface SelectionResolved {
    status: 'resolved';
    entry: CatalogEntry;
    via: ResolutionPath;
}

export interface SelectionCancelled {
    status: 'cancelled';
    exitCode: number;
    reason: CancelReason;
}

export interface SelectionEmpty {
    status: 'empty';
}

export interface SelectionViolation {
    status: 'violation';
    output: string;
}

export type SelectionOutcome = SelectionResolved | SelectionCancelled | SelectionEmpty | SelectionViolation;
