import {setTimeout as sleep} from "timers/promises";
import {BootstrapError, isTransient, toBootstrapError} from "./errors";

export interface GateOptions {
    // Delay between two evaluations of the predicate, in milliseconds.
    interval: number;
    // Overall budget, in milliseconds. The gate never waits past it by more than one interval.
    timeout: number;
    signal?: AbortSignal;
    // Used in the failure message, e.g. "k3s API on cp-1".
    description?: string;
}

export type GateResult =
    | {status: "ready", attempts: number}
    | {status: "timeout", attempts: number, lastError?: unknown};

const expired = Symbol("expired");

function cancelled(description: string, cause?: unknown): BootstrapError {
    return new BootstrapError("Cancelled", `cancelled while waiting for ${description}`, {cause});
}

// Evaluates `predicate` until it returns true or the timeout elapses.
//
// A predicate that throws counts as "not ready yet" (a host that is still
// rebooting refuses connections, for instance). Cancellation through the
// signal rejects with a `Cancelled` error.
export async function waitFor(predicate: (signal?: AbortSignal) => Promise<boolean>, options: GateOptions): Promise<GateResult> {
    const {interval, timeout, signal} = options;
    const description = options.description ?? "condition";
    const deadline = Date.now() + timeout;
    let attempts = 0;
    let lastError: unknown;

    while (true) {
        if (signal?.aborted) throw cancelled(description);

        const remaining = deadline - Date.now();
        if (remaining <= 0) return {status: "timeout", attempts, lastError};

        attempts++;
        const outcome = await raceDeadline(predicate(signal), remaining, signal)
            .catch((err: unknown) => {
                lastError = err;
                return false;
            });
        if (signal?.aborted) throw cancelled(description, lastError);
        if (outcome === true) return {status: "ready", attempts};

        const left = deadline - Date.now();
        if (left <= 0) return {status: "timeout", attempts, lastError};
        try {
            await sleep(Math.min(interval, left), undefined, {signal});
        } catch (err) {
            throw cancelled(description, err);
        }
    }
}

// Resolves with the evaluation's result, or with `expired` once `ms` has passed.
async function raceDeadline(evaluation: Promise<boolean>, ms: number, signal?: AbortSignal): Promise<boolean | typeof expired> {
    const timer = new AbortController();
    const onAbort = () => timer.abort();
    signal?.addEventListener("abort", onAbort, {once: true});
    try {
        return await Promise.race([
            evaluation,
            sleep(ms, expired, {signal: timer.signal}),
        ]);
    } finally {
        signal?.removeEventListener("abort", onAbort);
        timer.abort();
    }
}

// Waits with `waitFor` and turns a timeout into a `BootstrapError` of the given kind.
export async function requireReady(
    predicate: (signal?: AbortSignal) => Promise<boolean>,
    options: GateOptions,
    kind: "RebootTimeout" | "InitializationTimeout" | "Timeout",
): Promise<number> {
    const result = await waitFor(predicate, options);
    if (result.status === "ready") return result.attempts;

    const detail = result.lastError instanceof Error ? `: ${result.lastError.message}` : "";
    throw new BootstrapError(
        kind,
        `timed out after ${options.timeout}ms waiting for ${options.description ?? "condition"}${detail}`,
        {cause: result.lastError},
    );
}

export interface RetryOptions {
    // Total number of tries, including the first one.
    attempts: number;
    signal?: AbortSignal;
    onRetry?: (err: BootstrapError, attempt: number) => void;
}

// Reruns `operation` while it fails with a transient error, up to `attempts` tries.
// Any other failure, or the last transient one, is rethrown as a `BootstrapError`.
export async function retry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    let attempt = 1;
    while (true) {
        try {
            return await operation(attempt);
        } catch (err) {
            const error = toBootstrapError(err, "CommandFailure");
            if (options.signal?.aborted) throw new BootstrapError("Cancelled", "bootstrap run was cancelled", {cause: error});
            if (!isTransient(error) || attempt >= options.attempts) throw error;
            options.onRetry?.(error, attempt);
            attempt++;
        }
    }
}
