/**
 * Shared formatting utilities for CLI output.
 */

// ============= Duration =============

/**
 * Format a millisecond duration, tiered: ms → s → m+s → h+m.
 */
export function formatDuration(ms: number): string {
    if (ms < 1000) return `${Math.round(ms)}ms`;
    if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
    if (ms < 3600000) return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
    return `${Math.floor(ms / 3600000)}h ${Math.floor((ms % 3600000) / 60000)}m`;
}

// ============= Bytes =============

/**
 * Format bytes to human-readable size string.
 * Sub-KB values show no decimals; larger values show 1 decimal place.
 */
export function formatBytes(bytes: number): string {
    const units = ["B", "KB", "MB", "GB", "TB"];
    if (bytes < 1024) return `${bytes} B`;
    let size = bytes;
    let i = 0;
    while (size >= 1024 && i < units.length - 1) {
        size /= 1024;
        i++;
    }
    return `${size.toFixed(1)} ${units[i]}`;
}
