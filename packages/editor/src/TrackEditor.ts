import { SampleStore } from '@seqtape/kernel';
import type { SampleChain, StoreConfig } from '@seqtape/kernel';
import { loadTrack, saveTrack } from '@seqtape/codec';
import { identify, formatOccurrences, CORRELATION_THRESHOLD } from '@seqtape/dsp';
import type { Occurrence } from '@seqtape/dsp';

export interface TrackEditorOptions extends StoreConfig {
    /** Correlation threshold for ad identification (default 0.95). */
    threshold?: number;
    /** Log informational lines to the console. */
    verbose?: boolean;
}

/**
 * TrackEditor - high-level editing session.
 *
 * Responsibilities:
 * - Own one SampleStore and every track created through it.
 * - Load and save tracks as WAV files.
 * - Run ad identification and render its result as text.
 *
 * Codec failures are logged with console.error and rethrown unchanged.
 */
export class TrackEditor {
    private readonly store: SampleStore;
    private readonly threshold: number;
    private readonly verbose: boolean;
    private readonly tracks: Set<SampleChain> = new Set();

    constructor(options: TrackEditorOptions = {}) {
        const { threshold, verbose, ...storeConfig } = options;
        this.store = new SampleStore(storeConfig);
        this.threshold = threshold ?? CORRELATION_THRESHOLD;
        this.verbose = verbose ?? false;

        this.log(`Initialized (sharing: ${this.store.getSharingPolicy()}, threshold: ${this.threshold})`);
    }

    /**
     * Create an empty track owned by this editor.
     */
    createTrack(): SampleChain {
        const track = this.store.createChain();
        this.tracks.add(track);
        return track;
    }

    /**
     * Create a track and fill it from a WAV file.
     */
    openTrack(path: string): SampleChain {
        const track = this.createTrack();
        try {
            this.loadTrack(track, path);
        } catch (e) {
            this.closeTrack(track);
            throw e;
        }
        return track;
    }

    /**
     * Write the samples of a WAV file into `track` from position 0.
     *
     * @returns Number of samples loaded
     */
    loadTrack(track: SampleChain, path: string): number {
        let count: number;
        try {
            count = loadTrack(track, path);
        } catch (e) {
            console.error(`[TrackEditor] Failed to load ${path}:`, e);
            throw e;
        }
        this.log(`Loaded ${count} samples from ${path}`);
        return count;
    }

    /**
     * Write the whole track to a WAV file.
     *
     * @returns Number of samples saved
     */
    saveTrack(track: SampleChain, path: string): number {
        let count: number;
        try {
            count = saveTrack(track, path);
        } catch (e) {
            console.error(`[TrackEditor] Failed to save ${path}:`, e);
            throw e;
        }
        this.log(`Saved ${count} samples to ${path}`);
        return count;
    }

    /**
     * Locate occurrences of `ad` inside `target`.
     */
    findAds(target: SampleChain, ad: SampleChain): Occurrence[] {
        const matches = identify(target, ad, this.threshold);
        this.log(`Found ${matches.length} occurrence(s) of a ${ad.length()}-sample pattern`);
        return matches;
    }

    /**
     * Locate occurrences of `ad` inside `target` as `start,end` lines.
     */
    identifyAds(target: SampleChain, ad: SampleChain): string {
        return formatOccurrences(this.findAds(target, ad));
    }

    /**
     * Release a track's storage. The track is empty afterwards.
     */
    closeTrack(track: SampleChain): void {
        track.dispose();
        this.tracks.delete(track);
    }

    /**
     * Release every track created by this editor.
     */
    dispose(): void {
        for (const track of this.tracks) {
            track.dispose();
        }
        this.tracks.clear();
        this.log('Disposed');
    }

    getStore(): SampleStore {
        return this.store;
    }

    getThreshold(): number {
        return this.threshold;
    }

    getTrackCount(): number {
        return this.tracks.size;
    }

    private log(message: string): void {
        if (this.verbose) {
            console.log(`[TrackEditor] ${message}`);
        }
    }
}
