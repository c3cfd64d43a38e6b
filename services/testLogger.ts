/**
 * STRUCTURED TEST LOGGER
 *
 * Same JSON shape as appLogger, for test suites. Info and perf entries only
 * print with VITEST_VERBOSE=true (or DEBUG=true); warnings always print.
 * Metadata goes through the appLogger redaction, so span text and originals
 * never land in test output.
 */

import { redactLogValue } from './appLogger';

type LogValue = string | number | boolean | undefined;

interface LogMetadata {
    [key: string]: LogValue;
}

interface PerfMetrics {
    durationMs?: number;
    textLength?: number;
    spans?: number;
    chunks?: number;
}

const isVerbose = (): boolean => process.env.VITEST_VERBOSE === 'true' || process.env.DEBUG === 'true';

const entry = (level: string, event: string, metadata: object): string =>
    JSON.stringify({
        level,
        event,
        timestamp: new Date().toISOString(),
        ...(Object.keys(metadata).length > 0 ? { metadata: redactLogValue(metadata) } : {}),
    });

export const testLogger = {
    info(event: string, metadata: LogMetadata = {}): void {
        if (isVerbose()) console.log(entry('info', event, metadata));
    },

    perf(event: string, metrics: PerfMetrics): void {
        if (isVerbose()) console.log(entry('perf', event, metrics));
    },

    warn(event: string, metadata: LogMetadata = {}): void {
        console.warn(entry('warn', event, metadata));
    },

    /**
     * Time a promise-returning test step and log it as perf.
     */
    async timed<A>(event: string, run: () => Promise<A>, metrics: Omit<PerfMetrics, 'durationMs'> = {}): Promise<A> {
        const started = performance.now();
        const result = await run();
        this.perf(event, { ...metrics, durationMs: Math.round(performance.now() - started) });
        return result;
    },
};
