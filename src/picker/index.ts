/**
 * @file Selection engine public surface.
 *
 * @module
 */

export * from './types.js';
export * from './errors.js';
export { text_normalize } from './normalize.js';
export {
    span_locate,
    span_find,
    entry_fields,
    entry_score,
    match_compare,
    catalog_match,
    catalog_filter,
    type MatchSpan,
} from './FuzzyScorer.js';
export {
    ExternalFinder,
    executable_resolve,
    entry_serialize,
    finderArgs_build,
    finderOutput_interpret,
    type FinderOptions,
} from './FinderAdapter.js';
export { ReadlineLineReader, type ReadlineReaderOptions } from './LineReader.js';
export { PromptLoop, DISPLAY_LIMIT, PROMPT_TEXT, type PromptLoopOptions } from './PromptLoop.js';
export {
    SelectionOrchestrator,
    autoEntry_resolve,
    INTERRUPT_EXIT_CODE,
    type SelectionOptions,
} from './SelectionOrchestrator.js';
