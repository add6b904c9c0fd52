import os from "node:os";
import path from "node:path";

function resolveSetlistRemoteRoot(): string {
    const root = process.env.SETLIST_REMOTE_ROOT_DIR?.trim();
    if (root) {
        return path.resolve(root);
    }
    return path.join(os.homedir(), ".setlist-remote");
}

export const DEFAULT_SETLIST_REMOTE_DIR = resolveSetlistRemoteRoot();

export function resolveSetlistRemotePath(...segments: string[]): string {
    return path.join(DEFAULT_SETLIST_REMOTE_DIR, ...segments);
}
