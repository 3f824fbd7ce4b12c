import { CompletionMarker, RunFailure, RunHistoryEntry, RunSummary } from '../types';
import { logger } from './logger';

export class ReportGenerator {
    /**
     * Summary lines for a finished run
     */
    formatSummary(summary: RunSummary): string[] {
        const lines: string[] = [];
        lines.push('='.repeat(60));
        lines.push('MAIL MERGE COMPLETED');
        lines.push('='.repeat(60));
        lines.push(`Mode: ${summary.mode} | Label: ${summary.labelName}`);
        lines.push(`Processed: ${summary.processed}`);
        if (summary.mode === 'Draft') {
            lines.push(`Drafted: ${summary.drafted}`);
        } else {
            lines.push(`Sent: ${summary.sent}`);
        }
        lines.push(`Skipped: ${summary.skipped.length}`);
        lines.push(`Errors: ${summary.errors.length}`);
        if (summary.capReached) {
            lines.push(`Batch cap reached; ${summary.remaining} recipients still pending`);
        }

        if (summary.skipped.length > 0) {
            lines.push('-'.repeat(40));
            lines.push('SKIPPED (no address found)');
            for (const value of summary.skipped) {
                lines.push(`  ${value || '(empty)'}`);
            }
        }

        if (summary.errors.length > 0) {
            lines.push('-'.repeat(40));
            lines.push('ERRORS');
            for (const failure of summary.errors) {
                lines.push(`  ${failure.address}: ${failure.message}`);
            }
        }

        if (summary.warnings.length > 0) {
            lines.push('-'.repeat(40));
            lines.push('WARNINGS');
            for (const warning of summary.warnings) {
                lines.push(`  ${warning}`);
            }
        }

        lines.push('-'.repeat(40));
        lines.push(`Updated CSV: ${summary.outputFilePath}`);
        lines.push('='.repeat(60));
        return lines;
    }

    displaySummary(summary: RunSummary): void {
        for (const line of this.formatSummary(summary)) {
            logger.info(line);
        }
    }

    formatMarker(marker: CompletionMarker): string[] {
        return [
            `Previous mail merge completed at ${marker.completedAt}`,
            `Updated CSV: ${marker.outputFilePath}`,
        ];
    }

    displayHistory(entries: RunHistoryEntry[]): void {
        if (entries.length === 0) {
            logger.info('No mail merge runs recorded yet.');
            return;
        }

        logger.info('MERGE HISTORY');
        logger.info('-'.repeat(40));
        for (const entry of entries) {
            logger.info(
                `#${entry.id} ${entry.completedAt} ${entry.mode} [${entry.labelName}] ` +
                    `sent=${entry.sent} drafted=${entry.drafted} skipped=${entry.skipped} errors=${entry.errors}`,
            );
            logger.info(`  ${entry.inputFile} -> ${entry.outputFile}`);
        }
    }

    formatFailures(runId: number, failures: RunFailure[]): string[] {
        if (failures.length === 0) {
            return [`Run #${runId}: no skipped or failed recipients`];
        }
        const lines = [`Run #${runId}: ${failures.length} skipped or failed recipients`];
        for (const failure of failures) {
            lines.push(`  [${failure.status}] ${failure.email || '(empty)'}${failure.error ? `: ${failure.error}` : ''}`);
        }
        return lines;
    }
}
