/**
 * @file fuzzpick public API
 *
 * The selection engine, the catalog builders behind the two front-ends and
 * the front-end entry functions, for embedding a picker in another tool.
 *
 * @module
 */

export * from './picker/index.js';
export {
    CatalogBuilder,
    CatalogEntryInputSchema,
    type CatalogEntryInput,
    type CatalogOrder,
} from './catalog/CatalogBuilder.js';
export {
    CommandRegistry,
    defaultRegistry_create,
    helloCommand,
    type CommandContext,
    type CommandHandler,
    type CommandSpec,
} from './catalog/commands.js';
export {
    SCRIPT_EXTENSIONS,
    scripts_scan,
    scriptCatalog_build,
    script_execute,
    type ScriptEntry,
    type ScriptScanOptions,
} from './catalog/scripts.js';
export {
    SettingsService,
    SETTINGS_FILE_NAME,
    type PickerSettings,
    type SettingsKey,
    type SettingSource,
} from './config/settings.js';
export { Presenter, MARKERS, type TerminalSink, type PresenterOptions } from './ui/Presenter.js';
export { flow_run } from './cli/FlowCli.js';
export { scripts_run, type ScriptExecutor } from './cli/ScriptsCli.js';
export type { CliDeps } from './cli/session.js';
