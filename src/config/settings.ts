/**
 * @file Runtime Settings Service
 *
 * Project-scoped settings for the selection engine and its front-ends,
 * with central validation and deterministic precedence
 * (env > project file > defaults).
 *
 * The project file is `fuzzpick.yaml` in the project root:
 *
 *   finder:
 *     command: fzf
 *     enabled: true
 *     height: 40%
 *     timeout_ms: 0
 *   scripts:
 *     dir: scripts
 *     exclude_prefixes: ['_', '.']
 *   interrupt_exit_code: 130
 *   debug: false
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { SettingsError } from '../picker/errors.js';
import type { EnvMap } from '../picker/types.js';

export type { EnvMap };

export interface PickerSettings {
    finderCommand: string;
    finderEnabled: boolean;
    /** Panel height handed to the finder, rows or percent (`40%`). */
    finderHeight: string;
    /** 0 disables the timeout. */
    finderTimeoutMs: number;
    scriptsDir: string;
    excludePrefixes: string[];
    interruptExitCode: number;
    debug: boolean;
}

export type SettingsKey = keyof PickerSettings;

export type SettingSource = 'env' | 'file' | 'default';

export const SETTINGS_FILE_NAME: string = 'fuzzpick.yaml';

const DEFAULTS: PickerSettings = {
    finderCommand: 'fzf',
    finderEnabled: true,
    finderHeight: '40%',
    finderTimeoutMs: 0,
    scriptsDir: 'scripts',
    excludePrefixes: ['_', '.'],
    interruptExitCode: 130,
    debug: false,
};

const TRUTHY: ReadonlySet<string> = new Set(['1', 'true', 'yes', 'on']);

// ─── Schemas ─────────────────────────────────────────────────────────────────

const HeightSchema = z.string().regex(/^\d+%?$/, 'expected rows or a percentage such as 40%');

const SettingsFileSchema = z.object({
    finder: z.object({
        command:    z.string().min(1).optional(),
        enabled:    z.boolean().optional(),
        height:     z.union([HeightSchema, z.number().int().positive().transform(String)]).optional(),
        timeout_ms: z.number().int().nonnegative().optional()
    }).strict().optional(),
    scripts: z.object({
        dir:              z.string().min(1).optional(),
        exclude_prefixes: z.array(z.string().min(1)).optional()
    }).strict().optional(),
    interrupt_exit_code: z.number().int().min(0).max(255).optional(),
    debug:               z.boolean().optional()
}).strict();

type SettingsFile = z.infer<typeof SettingsFileSchema>;

const EnvSchema = z.object({
    FUZZPICK_FINDER:            z.string().min(1).optional(),
    FUZZPICK_NO_FINDER:         z.string().optional(),
    FUZZPICK_FINDER_HEIGHT:     HeightSchema.optional(),
    FUZZPICK_FINDER_TIMEOUT_MS: z.string().regex(/^\d+$/, 'expected a non-negative integer').optional(),
    FUZZPICK_SCRIPTS_DIR:       z.string().min(1).optional(),
    FUZZPICK_DEBUG:             z.string().optional()
});

type EnvSettings = z.infer<typeof EnvSchema>;

/**
 * Interpret a switch-like env value.
 */
export function truthy_parse(value: string | undefined): boolean {
    if (value === undefined) return false;
    return TRUTHY.has(value.trim().toLowerCase());
}

function issues_describe(error: z.ZodError): string {
    return error.issues
        .map((issue: z.ZodIssue): string => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

function fileSettings_map(file: SettingsFile): Partial<PickerSettings> {
    const mapped: Partial<PickerSettings> = {};
    if (file.finder?.command !== undefined) mapped.finderCommand = file.finder.command;
    if (file.finder?.enabled !== undefined) mapped.finderEnabled = file.finder.enabled;
    if (file.finder?.height !== undefined) mapped.finderHeight = file.finder.height;
    if (file.finder?.timeout_ms !== undefined) mapped.finderTimeoutMs = file.finder.timeout_ms;
    if (file.scripts?.dir !== undefined) mapped.scriptsDir = file.scripts.dir;
    if (file.scripts?.exclude_prefixes !== undefined) mapped.excludePrefixes = file.scripts.exclude_prefixes;
    if (file.interrupt_exit_code !== undefined) mapped.interruptExitCode = file.interrupt_exit_code;
    if (file.debug !== undefined) mapped.debug = file.debug;
    return mapped;
}

function envSettings_map(env: EnvSettings): Partial<PickerSettings> {
    const mapped: Partial<PickerSettings> = {};
    if (env.FUZZPICK_FINDER !== undefined) mapped.finderCommand = env.FUZZPICK_FINDER;
    if (env.FUZZPICK_NO_FINDER !== undefined) mapped.finderEnabled = !truthy_parse(env.FUZZPICK_NO_FINDER);
    if (env.FUZZPICK_FINDER_HEIGHT !== undefined) mapped.finderHeight = env.FUZZPICK_FINDER_HEIGHT;
    if (env.FUZZPICK_FINDER_TIMEOUT_MS !== undefined) {
        mapped.finderTimeoutMs = Number.parseInt(env.FUZZPICK_FINDER_TIMEOUT_MS, 10);
    }
    if (env.FUZZPICK_SCRIPTS_DIR !== undefined) mapped.scriptsDir = env.FUZZPICK_SCRIPTS_DIR;
    if (env.FUZZPICK_DEBUG !== undefined) mapped.debug = truthy_parse(env.FUZZPICK_DEBUG);
    return mapped;
}

/**
 * Drop unset and blank env values so they fall through to lower layers.
 */
function env_compact(env: EnvMap): EnvMap {
    const compact: EnvMap = {};
    for (const [key, value] of Object.entries(env)) {
        if (key.startsWith('FUZZPICK_') && value !== undefined && value.trim() !== '') {
            compact[key] = value.trim();
        }
    }
    return compact;
}

// ─── Service ─────────────────────────────────────────────────────────────────

export interface SettingsLoadOptions {
    /** Project root holding the settings file. */
    root: string;
    env?: EnvMap;
    fileName?: string;
}

export class SettingsService {
    private readonly fromFile: Partial<PickerSettings>;
    private readonly fromEnv: Partial<PickerSettings>;

    constructor(fileSettings: Partial<PickerSettings> = {}, envSettings: Partial<PickerSettings> = {}) {
        this.fromFile = fileSettings;
        this.fromEnv = envSettings;
    }

    /**
     * Read the project file (when present) and the environment.
     *
     * @throws SettingsError when either source fails validation.
     */
    public static load(options: SettingsLoadOptions): SettingsService {
        const filePath: string = path.join(options.root, options.fileName ?? SETTINGS_FILE_NAME);
        const fileSettings: Partial<PickerSettings> = fs.existsSync(filePath)
            ? SettingsService.file_parse(fs.readFileSync(filePath, 'utf-8'), filePath)
            : {};
        const envSettings: Partial<PickerSettings> = SettingsService.env_parse(options.env ?? process.env);
        return new SettingsService(fileSettings, envSettings);
    }

    /**
     * Validate YAML settings text. An empty document is an empty config.
     */
    public static file_parse(content: string, source: string = SETTINGS_FILE_NAME): Partial<PickerSettings> {
        let raw: unknown;
        try {
            raw = yaml.load(content);
        } catch (e: unknown) {
            throw new SettingsError(source, e instanceof Error ? e.message : String(e));
        }
        if (raw === undefined || raw === null) return {};

        const parsed = SettingsFileSchema.safeParse(raw);
        if (!parsed.success) {
            throw new SettingsError(source, issues_describe(parsed.error));
        }
        return fileSettings_map(parsed.data);
    }

    /**
     * Validate `FUZZPICK_*` environment overrides.
     */
    public static env_parse(env: EnvMap): Partial<PickerSettings> {
        const parsed = EnvSchema.safeParse(env_compact(env));
        if (!parsed.success) {
            throw new SettingsError('environment', issues_describe(parsed.error));
        }
        return envSettings_map(parsed.data);
    }

    /**
     * Effective settings.
     */
    public snapshot(): PickerSettings {
        return {
            finderCommand: this.value_get('finderCommand'),
            finderEnabled: this.value_get('finderEnabled'),
            finderHeight: this.value_get('finderHeight'),
            finderTimeoutMs: this.value_get('finderTimeoutMs'),
            scriptsDir: this.value_get('scriptsDir'),
            excludePrefixes: [...this.value_get('excludePrefixes')],
            interruptExitCode: this.value_get('interruptExitCode'),
            debug: this.value_get('debug'),
        };
    }

    /**
     * Effective value of one key.
     */
    public value_get<K extends SettingsKey>(key: K): PickerSettings[K] {
        const envValue: PickerSettings[K] | undefined = this.fromEnv[key];
        if (envValue !== undefined) return envValue;
        const fileValue: PickerSettings[K] | undefined = this.fromFile[key];
        if (fileValue !== undefined) return fileValue;
        return DEFAULTS[key];
    }

    /**
     * Which layer supplied the effective value of a key.
     */
    public source_get(key: SettingsKey): SettingSource {
        if (this.fromEnv[key] !== undefined) return 'env';
        if (this.fromFile[key] !== undefined) return 'file';
        return 'default';
    }
}
