/**
 * Optional step-reporting capability.
 *
 * A reporter records a named, parameterized scope around each traced call
 * (for example a test report). The no-op reporter is installed by default;
 * embedders select a real one once at startup with `setStepReporter()`.
 */

/** An open step; closed exactly once, on every exit path. */
export interface StepScope {
    close(error?: unknown): void;
}

export interface StepReporter {
    open(title: string, params: Readonly<Record<string, string>>): StepScope;
}

const closedScope: StepScope = { close: () => {} };

export class NoopStepReporter implements StepReporter {
    open(_title: string, _params: Readonly<Record<string, string>>): StepScope {
        return closedScope;
    }
}

export type StepStatus = 'running' | 'passed' | 'failed';

export interface StepRecord {
    title: string;
    params: Readonly<Record<string, string>>;
    /** Number of steps that were open when this one started */
    depth: number;
    status: StepStatus;
    error?: unknown;
}

/**
 * Keeps every step in memory, in the order they were opened.
 * Nesting mirrors the call stack: a step opened inside another gets depth + 1.
 */
export class MemoryStepReporter implements StepReporter {
    public steps: StepRecord[] = [];
    private active = 0;

    open(title: string, params: Readonly<Record<string, string>>): StepScope {
        const record: StepRecord = { title, params: { ...params }, depth: this.active, status: 'running' };
        this.steps.push(record);
        this.active++;
        let closed = false;
        return {
            close: (error?: unknown) => {
                if (closed) return;
                closed = true;
                this.active--;
                record.status = error === undefined ? 'passed' : 'failed';
                if (error !== undefined) record.error = error;
            },
        };
    }

    /** Steps still open */
    get openCount(): number {
        return this.active;
    }

    clear(): void {
        this.steps = [];
        this.active = 0;
    }
}

let reporter: StepReporter = new NoopStepReporter();

export function getStepReporter(): StepReporter {
    return reporter;
}

/** Select the process-wide reporter. Passing nothing restores the no-op one. */
export function setStepReporter(next?: StepReporter): void {
    reporter = next ?? new NoopStepReporter();
}
