import dotenv from 'dotenv';
dotenv.config();

import * as fs from 'fs/promises';
import YAML from 'yaml';
import {isDiscoveryMode, WatchConfig, createWatchConfig, WatchOptions} from "./WatchConfig.js";
import {DEFAULT_MEDIA_EXTENSIONS} from "./SupportedFileTypes.js";
import {ConfigurationError} from "../errors/WatchErrors.js";
import type {CommandProcessorOptions} from "../logic/CommandProcessor.js";

/**
 * Settings for the command line entry point.
 *
 * Values come from an optional YAML file (`DROPWATCH_CONFIG_FILE`) and from
 * `DROPWATCH_*` environment variables (`.env` is loaded through dotenv);
 * environment variables win over the file.
 */
export interface DropwatchSettings {
    watch: WatchConfig;
    /** Command run for every file; absent means files are only recorded */
    command?: CommandProcessorOptions;
    /** How long shutdown waits for a running command (default 30000ms) */
    stopTimeoutMs: number;
}

/** Keys accepted in the YAML file */
interface FileSettings {
    inputDirectory?: string;
    acceptedExtensions?: string[];
    pollIntervalSeconds?: number;
    debounceSeconds?: number;
    recursive?: boolean;
    registryFilePath?: string;
    discoveryMode?: string;
    transientSuffixes?: string[];
    createIfMissing?: boolean;
    command?: string[];
    commandTimeoutSeconds?: number;
    stopTimeoutSeconds?: number;
}

const DEFAULT_STOP_TIMEOUT_SECONDS = 30;

// =============================================================================
// Value parsing
// =============================================================================

export function parseList(value: string): string[] {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

export function parseBoolean(value: string, option: string): boolean {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) {
        return true;
    }
    if (['false', '0', 'no', 'off'].includes(normalized)) {
        return false;
    }
    throw new ConfigurationError(`Expected a boolean, got '${value}'`, option);
}

export function parseNumber(value: string, option: string): number {
    const parsed = Number(value.trim());
    if (value.trim().length === 0 || Number.isNaN(parsed)) {
        throw new ConfigurationError(`Expected a number, got '${value}'`, option);
    }
    return parsed;
}

/**
 * Split a command line into words. Single and double quotes group words;
 * there is no escaping inside quotes.
 */
export function splitCommandLine(commandLine: string): string[] {
    const words: string[] = [];
    const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(commandLine)) !== null) {
        words.push(match[1] ?? match[2] ?? match[3] ?? '');
    }
    return words;
}

// =============================================================================
// YAML file
// =============================================================================

function readString(raw: Record<string, unknown>, key: string, filePath: string): string | undefined {
    const value = raw[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new ConfigurationError(`'${key}' must be a string in ${filePath}`, key);
    }
    return value;
}

function readNumber(raw: Record<string, unknown>, key: string, filePath: string): number | undefined {
    const value = raw[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'number') {
        throw new ConfigurationError(`'${key}' must be a number in ${filePath}`, key);
    }
    return value;
}

function readBoolean(raw: Record<string, unknown>, key: string, filePath: string): boolean | undefined {
    const value = raw[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'boolean') {
        throw new ConfigurationError(`'${key}' must be true or false in ${filePath}`, key);
    }
    return value;
}

/** A YAML list, or a comma separated string */
function readList(raw: Record<string, unknown>, key: string, filePath: string): string[] | undefined {
    const value = raw[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value === 'string') {
        return parseList(value);
    }
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
        return value;
    }
    throw new ConfigurationError(`'${key}' must be a list of strings in ${filePath}`, key);
}

function readCommand(raw: Record<string, unknown>, filePath: string): string[] | undefined {
    const value = raw.command;
    if (typeof value === 'string') {
        return splitCommandLine(value);
    }
    return readList(raw, 'command', filePath);
}

/**
 * Load the optional YAML settings file
 */
export async function loadConfigFile(filePath: string): Promise<FileSettings> {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Configuration file not found or not readable: ${filePath}`, 'DROPWATCH_CONFIG_FILE', error);
    }

    let raw: unknown;
    try {
        raw = YAML.parse(content);
    } catch (error) {
        throw new ConfigurationError(`Invalid YAML syntax in ${filePath}`, 'DROPWATCH_CONFIG_FILE', error);
    }

    if (raw === null || raw === undefined) {
        return {};
    }
    if (typeof raw !== 'object' || Array.isArray(raw)) {
        throw new ConfigurationError(`Configuration must be an object in ${filePath}`, 'DROPWATCH_CONFIG_FILE');
    }
    const values: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

    return {
        inputDirectory: readString(values, 'inputDirectory', filePath),
        acceptedExtensions: readList(values, 'acceptedExtensions', filePath),
        pollIntervalSeconds: readNumber(values, 'pollIntervalSeconds', filePath),
        debounceSeconds: readNumber(values, 'debounceSeconds', filePath),
        recursive: readBoolean(values, 'recursive', filePath),
        registryFilePath: readString(values, 'registryFilePath', filePath),
        discoveryMode: readString(values, 'discoveryMode', filePath),
        transientSuffixes: readList(values, 'transientSuffixes', filePath),
        createIfMissing: readBoolean(values, 'createIfMissing', filePath),
        command: readCommand(values, filePath),
        commandTimeoutSeconds: readNumber(values, 'commandTimeoutSeconds', filePath),
        stopTimeoutSeconds: readNumber(values, 'stopTimeoutSeconds', filePath),
    };
}

// =============================================================================
// Environment
// =============================================================================

function optional<T>(value: string | undefined, parse: (raw: string) => T): T | undefined {
    if (value === undefined || value.trim().length === 0) {
        return undefined;
    }
    return parse(value);
}

/**
 * Build the settings from the environment (and the YAML file it points at).
 */
export async function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Promise<DropwatchSettings> {
    const configFile = optional(env.DROPWATCH_CONFIG_FILE, value => value.trim());
    const file: FileSettings = configFile ? await loadConfigFile(configFile) : {};

    const discoveryMode = optional(env.DROPWATCH_DISCOVERY_MODE, value => value.trim().toLowerCase()) ?? file.discoveryMode;
    if (discoveryMode !== undefined && !isDiscoveryMode(discoveryMode)) {
        throw new ConfigurationError(`Unknown discovery mode '${discoveryMode}', expected auto, events or polling`, 'DROPWATCH_DISCOVERY_MODE');
    }

    const options: WatchOptions = {
        inputDirectory: optional(env.DROPWATCH_INPUT_DIRECTORY, value => value.trim()) ?? file.inputDirectory ?? '',
        acceptedExtensions: optional(env.DROPWATCH_EXTENSIONS, parseList) ?? file.acceptedExtensions ?? DEFAULT_MEDIA_EXTENSIONS,
        pollIntervalSeconds: optional(env.DROPWATCH_POLL_INTERVAL_SECONDS, value => parseNumber(value, 'DROPWATCH_POLL_INTERVAL_SECONDS')) ?? file.pollIntervalSeconds,
        debounceSeconds: optional(env.DROPWATCH_DEBOUNCE_SECONDS, value => parseNumber(value, 'DROPWATCH_DEBOUNCE_SECONDS')) ?? file.debounceSeconds,
        recursive: optional(env.DROPWATCH_RECURSIVE, value => parseBoolean(value, 'DROPWATCH_RECURSIVE')) ?? file.recursive,
        registryFilePath: optional(env.DROPWATCH_REGISTRY_FILE, value => value.trim()) ?? file.registryFilePath,
        discoveryMode,
        transientSuffixes: optional(env.DROPWATCH_TRANSIENT_SUFFIXES, parseList) ?? file.transientSuffixes,
        createIfMissing: optional(env.DROPWATCH_CREATE_INPUT_DIRECTORY, value => parseBoolean(value, 'DROPWATCH_CREATE_INPUT_DIRECTORY')) ?? file.createIfMissing,
    };

    const commandLine = optional(env.DROPWATCH_COMMAND, splitCommandLine) ?? file.command;
    const commandTimeoutSeconds = optional(env.DROPWATCH_COMMAND_TIMEOUT_SECONDS, value => parseNumber(value, 'DROPWATCH_COMMAND_TIMEOUT_SECONDS')) ?? file.commandTimeoutSeconds;
    const stopTimeoutSeconds = optional(env.DROPWATCH_STOP_TIMEOUT_SECONDS, value => parseNumber(value, 'DROPWATCH_STOP_TIMEOUT_SECONDS')) ?? file.stopTimeoutSeconds ?? DEFAULT_STOP_TIMEOUT_SECONDS;

    if (commandTimeoutSeconds !== undefined && commandTimeoutSeconds < 0) {
        throw new ConfigurationError(`Expected a non-negative number, got ${commandTimeoutSeconds}`, 'DROPWATCH_COMMAND_TIMEOUT_SECONDS');
    }
    if (stopTimeoutSeconds < 0) {
        throw new ConfigurationError(`Expected a non-negative number, got ${stopTimeoutSeconds}`, 'DROPWATCH_STOP_TIMEOUT_SECONDS');
    }

    const settings: DropwatchSettings = {
        watch: createWatchConfig(options),
        stopTimeoutMs: stopTimeoutSeconds * 1000,
    };
    if (commandLine && commandLine.length > 0) {
        const [command, ...args] = commandLine;
        settings.command = {
            command,
            args,
            timeoutMs: commandTimeoutSeconds !== undefined ? commandTimeoutSeconds * 1000 : undefined,
        };
    }
    return settings;
}
