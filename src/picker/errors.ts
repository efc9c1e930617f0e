/**
 * Typed error classes for the selection engine and its front-ends
 */

export class PickerError extends Error {
    public readonly code: string;

    constructor(message: string, code: string) {
        super(message);
        this.name = 'PickerError';
        this.code = code;
        Error.captureStackTrace?.(this, this.constructor);
    }
}

export class DuplicateEntryError extends PickerError {
    public readonly identifier: string;

    constructor(identifier: string) {
        super(`Entry '${identifier}' already registered`, 'DUPLICATE_ENTRY');
        this.name = 'DuplicateEntryError';
        this.identifier = identifier;
    }
}

export class InvalidEntryError extends PickerError {
    public readonly identifier: string;

    constructor(identifier: string, reason: string) {
        super(`Invalid entry '${identifier}': ${reason}`, 'INVALID_ENTRY');
        this.name = 'InvalidEntryError';
        this.identifier = identifier;
    }
}

export class FinderLaunchError extends PickerError {
    public readonly command: string;

    constructor(command: string, reason: string) {
        super(`Could not run finder '${command}': ${reason}`, 'FINDER_LAUNCH');
        this.name = 'FinderLaunchError';
        this.command = command;
    }
}

export class SettingsError extends PickerError {
    public readonly source: string;

    constructor(source: string, reason: string) {
        super(`Invalid settings in ${source}: ${reason}`, 'INVALID_SETTINGS');
        this.name = 'SettingsError';
        this.source = source;
    }
}
