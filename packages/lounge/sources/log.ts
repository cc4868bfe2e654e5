import { createRequire } from "node:module";

import pino, {
    type DestinationStream,
    type Level,
    type LevelWithSilent,
    type Logger,
    type LoggerOptions
} from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: LevelWithSilent;
    format: LogFormat;
    destination: LogDestination;
    file: string | null;
    redact: string[];
    service: string;
    environment: string;
};

const DEFAULT_REDACT = ["token", "password", "secret", "apiKey", "*.token", "*.password", "*.secret", "*.apiKey"];

const VALID_FORMATS = new Set<string>(["pretty", "json"]);
const VALID_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const FILE_LEVEL: Level = "debug";
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;
let rootStreams: ReturnType<typeof pino.multistream> | null = null;
const attachedFiles = new Set<string>();

const MODULE_WIDTH = 16;
const PRETTY_RESERVED_FIELDS = new Set([
    "pid",
    "hostname",
    "level",
    "time",
    "timestamp",
    "__time",
    "__level",
    "service",
    "environment",
    "module",
    "msg"
]);

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    const config = resolveLogConfig(overrides);
    rootLogger = buildLogger(config);
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
    rootStreams = null;
    attachedFiles.clear();
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        parseLevel(envValue("LOUNGE_LOG_LEVEL")) ??
        parseLevel(envValue("LOG_LEVEL")) ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination =
        overrides.destination ?? envValue("LOUNGE_LOG_DEST") ?? envValue("LOG_DEST") ?? "stderr";
    const forceJson = parseBooleanFlag(envValue("LOUNGE_LOG_JSON")) ?? parseBooleanFlag(envValue("LOG_JSON")) ?? false;
    let format =
        overrides.format ??
        parseFormat(envValue("LOUNGE_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");
    const file = overrides.file ?? envValue("LOUNGE_LOG_FILE");
    const service = overrides.service ?? envValue("LOUNGE_LOG_SERVICE") ?? "lounge";
    const environment = overrides.environment ?? envValue("NODE_ENV") ?? "development";

    if (!isStdDestination(destination)) {
        format = "json";
    }

    const redact = overrides.redact ?? mergeRedactList(DEFAULT_REDACT, envValue("LOUNGE_LOG_REDACT"));

    return {
        level,
        format,
        destination,
        file,
        redact,
        service,
        environment
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: resolveRootLevel(config),
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service,
            environment: config.environment
        },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    // Console keeps its configured level; file sinks added now or later always record debug.
    const streams: { level: Level; stream: DestinationStream }[] = [];
    if (config.level !== "silent") {
        streams.push({ level: config.level, stream: resolveConsoleStream(config) ?? pino.destination(1) });
    }
    rootStreams = pino.multistream(streams);
    if (config.file) {
        logFileAttach(config.file);
    }
    return pino(options, rootStreams);
}

/**
 * Adds a JSON file sink at debug level to the root logger, including loggers created earlier.
 * Expects: initLogging has run with a level other than silent.
 */
export function logFileAttach(filePath: string): void {
    if (!rootStreams || attachedFiles.has(filePath)) {
        return;
    }
    attachedFiles.add(filePath);
    rootStreams.add({ level: FILE_LEVEL, stream: pino.destination({ dest: filePath, mkdir: true, sync: false }) });
}

function resolveRootLevel(config: LogConfig): LevelWithSilent {
    if (config.level === "silent") {
        return config.file ? FILE_LEVEL : "silent";
    }
    return pino.levels.values[config.level] < pino.levels.values[FILE_LEVEL] ? config.level : FILE_LEVEL;
}

function resolveConsoleStream(config: LogConfig): DestinationStream | undefined {
    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            return prettyFactory({
                colorize: !process.env.NO_COLOR,
                translateTime: false,
                ignore: "pid,hostname,level,service,environment,module",
                hideObject: true,
                levelKey: "__level",
                timestampKey: "__time",
                messageFormat: formatPrettyMessage,
                singleLine: false,
                destination: config.destination === "stdout" ? 1 : 2
            });
        }
    }
    return resolveDestination(config.destination);
}

export function formatPrettyMessage(
    log: Record<string, unknown>,
    messageKey: string,
    _levelLabel: string,
    extra?: {
        colors?: {
            gray?: (value: string) => string;
            cyan?: (value: string) => string;
            yellow?: (value: string) => string;
            red?: (value: string) => string;
        };
    }
): string {
    const colors = extra?.colors;
    const level = typeof log.level === "number" ? log.level : 30;
    const colorTime = colors?.gray ?? ((value: string) => value);
    const colorMessage =
        (level >= 50 ? colors?.red : level === 40 ? colors?.yellow : colors?.cyan) ?? ((value: string) => value);
    const time = formatLogTime(log.time ?? log.timestamp ?? Date.now());
    const module = `[${padModuleName(normalizeModule(typeof log.module === "string" ? log.module : undefined))}]`;
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details = formatPrettyDetails(log, messageKey, message);
    const content = [module, message, details].filter((part) => part.length > 0).join(" ");
    return `${colorTime(`[${time}]`)} ${colorMessage(content)}`;
}

function normalizeModule(moduleName?: string): string {
    if (typeof moduleName !== "string") {
        return "unknown";
    }
    const trimmed = moduleName.trim();
    return trimmed.length > 0 ? trimmed : "unknown";
}

function padModuleName(value: string): string {
    if (value.length >= MODULE_WIDTH) {
        return value.slice(0, MODULE_WIDTH);
    }
    return value.padEnd(MODULE_WIDTH, " ");
}

function formatPrettyDetails(log: Record<string, unknown>, messageKey: string, message: string): string {
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        if (message.includes(`${key}=`)) {
            continue;
        }
        details.push(`${key}=${formatPrettyDetailValue(key, value)}`);
    }
    return details.join(" ");
}

function formatPrettyDetailValue(key: string, value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (typeof value === "string") {
        return formatPrettyTextValue(value);
    }
    if (key === "error") {
        return formatPrettyErrorValue(value);
    }
    if (Array.isArray(value)) {
        return formatPrettyTextValue(value.join(","));
    }
    if (typeof value === "object") {
        try {
            return formatPrettyTextValue(JSON.stringify(value));
        } catch {
            return formatPrettyTextValue(String(value));
        }
    }
    return formatPrettyTextValue(String(value));
}

function formatPrettyErrorValue(value: unknown): string {
    if (value instanceof Error) {
        return formatPrettyTextValue(`${value.name}:${value.message}`);
    }
    if (typeof value === "object" && value !== null) {
        const type = "type" in value && typeof value.type === "string" ? value.type : null;
        const message = "message" in value && typeof value.message === "string" ? value.message : null;
        const parts = [type, message].filter((item): item is string => item !== null);
        if (parts.length > 0) {
            return formatPrettyTextValue(parts.join(":"));
        }
    }
    return formatPrettyTextValue(String(value));
}

function formatPrettyTextValue(value: string): string {
    const MAX_LENGTH = 180;
    const truncated = value.length > MAX_LENGTH ? `${value.slice(0, MAX_LENGTH)}...` : value;
    if (truncated.trim().length === 0) {
        return '""';
    }
    if (/[=\s]/.test(truncated)) {
        return JSON.stringify(truncated);
    }
    return truncated;
}

function formatLogTime(value: unknown): string {
    let date =
        value instanceof Date
            ? value
            : new Date(typeof value === "number" || typeof value === "string" ? value : Date.now());
    if (Number.isNaN(date.getTime())) {
        date = new Date();
    }
    return [date.getHours(), date.getMinutes(), date.getSeconds()].map((part) => String(part).padStart(2, "0")).join(":");
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseLevel(value: string | null): LevelWithSilent | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase();
    return VALID_LEVELS.find((level) => level === normalized) ?? null;
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase();
    if (!VALID_FORMATS.has(normalized)) {
        return null;
    }
    return normalized === "json" ? "json" : "pretty";
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

function mergeRedactList(base: string[], extra: string | null): string[] {
    if (!extra) {
        return [...base];
    }
    const additions = extra
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean);
    return [...new Set([...base, ...additions])];
}

function isStdDestination(destination: LogDestination): boolean {
    return destination === "stdout" || destination === "stderr";
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
