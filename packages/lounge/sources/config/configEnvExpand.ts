const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replaces `${NAME}` references with values from env; unset names expand to "".
 */
export function configEnvExpand(value: string, env: NodeJS.ProcessEnv): string {
    return value.replace(ENV_REFERENCE, (_match, name: string) => env[name] ?? "");
}
