export type BootstrapErrorKind =
    | "InstallFailure"
    | "RebootTimeout"
    | "ConfigRenderError"
    | "InitializationTimeout"
    | "JoinPreconditionUnmet"
    | "SecretConflict"
    | "AddonApplyFailure"
    | "Timeout"
    | "CommandFailure"
    | "ConnectionError"
    | "Cancelled"
    | "InvalidSettings"
    | "QuorumLost";

const transientKinds: ReadonlySet<BootstrapErrorKind> = new Set<BootstrapErrorKind>(["RebootTimeout", "ConnectionError"]);

export class BootstrapError extends Error {
    readonly kind: BootstrapErrorKind;

    constructor(kind: BootstrapErrorKind, message: string, options?: {cause?: unknown}) {
        super(message, options);
        this.name = "BootstrapError";
        this.kind = kind;
    }

    get transient(): boolean {
        return transientKinds.has(this.kind);
    }
}

export function isTransient(err: unknown): boolean {
    return err instanceof BootstrapError && err.transient;
}

export function isCancelled(err: unknown): boolean {
    return err instanceof BootstrapError && err.kind === "Cancelled";
}

// Wraps anything thrown by a step into a BootstrapError, keeping the original as cause.
export function toBootstrapError(err: unknown, fallback: BootstrapErrorKind): BootstrapError {
    if (err instanceof BootstrapError) return err;
    if (err instanceof Error && err.name === "AbortError") {
        return new BootstrapError("Cancelled", "bootstrap run was cancelled", {cause: err});
    }
    const message = err instanceof Error ? err.message : String(err);
    return new BootstrapError(fallback, message, {cause: err});
}
