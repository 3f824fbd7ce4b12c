import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { describeError } from '../errors';
import { CompletionMarker } from '../types';
import { logger } from './logger';

const markerSchema = z.object({
    completedAt: z.string(),
    outputFilePath: z.string().min(1),
});

/**
 * Completion marker for the last finished run, kept at a fixed path so the
 * next invocation can offer the previous result instead of re-running.
 */
export class RecoveryStore {
    constructor(readonly markerPath: string) {}

    read(): CompletionMarker | null {
        if (!fs.existsSync(this.markerPath)) {
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(this.markerPath, 'utf-8'));
        } catch (error) {
            logger.warn(`Ignoring unreadable completion marker ${this.markerPath}: ${describeError(error)}`);
            return null;
        }

        const parsed = markerSchema.safeParse(raw);
        if (!parsed.success) {
            logger.warn(`Ignoring malformed completion marker ${this.markerPath}`);
            return null;
        }
        return parsed.data;
    }

    // Marker whose output file still exists
    findCompletedRun(): CompletionMarker | null {
        const marker = this.read();
        if (!marker) {
            return null;
        }
        if (!fs.existsSync(marker.outputFilePath)) {
            logger.warn(`Completion marker points to missing file ${marker.outputFilePath}`);
            return null;
        }
        return marker;
    }

    write(marker: CompletionMarker) {
        fs.mkdirSync(path.dirname(this.markerPath), { recursive: true });
        fs.writeFileSync(this.markerPath, JSON.stringify(marker, null, 2));
        logger.info(`Completion marker written to ${this.markerPath}`);
    }

    clear(): boolean {
        if (!fs.existsSync(this.markerPath)) {
            return false;
        }
        fs.rmSync(this.markerPath);
        logger.info(`Completion marker removed: ${this.markerPath}`);
        return true;
    }
}

/**
 * Start-up gate for `send`: with `reset` the marker is dropped and the run may
 * proceed; otherwise a marker whose output still exists is returned and the
 * caller must stop.
 */
export function resolvePreviousRun(recovery: RecoveryStore, reset: boolean): CompletionMarker | null {
    if (reset) {
        recovery.clear();
        return null;
    }
    return recovery.findCompletedRun();
}
