import type { Dataset } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Single-slot cache for a loaded dataset.
 *
 * Owned by whoever renders the dashboard; the pipeline functions take
 * tables as arguments and never consult it. The first `get()` runs the
 * loader, later calls return the same snapshot until `clear()`.
 */
export class DatasetCache {
    private snapshot: Dataset | null = null;
    private loads = 0;

    constructor(private readonly loader: () => Dataset) {}

    /**
     * Return the cached dataset, loading it on first access.
     */
    get(): Dataset {
        if (this.snapshot) {
            getLogger().debug('Dataset cache hit');
            return this.snapshot;
        }

        this.snapshot = this.loader();
        this.loads++;
        getLogger().debug({ loads: this.loads }, 'Dataset cache populated');
        return this.snapshot;
    }

    isLoaded(): boolean {
        return this.snapshot !== null;
    }

    /**
     * Drop the snapshot so the next `get()` reloads.
     */
    clear(): void {
        this.snapshot = null;
    }

    /**
     * Get cache stats.
     */
    getStats(): { loaded: boolean; loads: number } {
        return {
            loaded: this.isLoaded(),
            loads: this.loads,
        };
    }
}
