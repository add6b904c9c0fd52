/**
 * Joins one or more protocol commands into a request path under basePath.
 * Expects: commands are opcodes or key paths and need no escaping.
 */
export function protocolRequestPathBuild(commands: readonly string[], basePath: string): string {
    const base = basePath.endsWith("/") ? basePath.slice(0, -1) : basePath;
    if (commands.length === 0) {
        return base;
    }
    return `${base}/${commands.join(";")}`;
}
