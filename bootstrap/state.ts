import {NodeRole} from "../hcloud/settings";
import {BootstrapError, BootstrapErrorKind} from "./errors";

export type Phase =
    | "NotStarted"
    | "Installing"
    | "Rebooting"
    | "AwaitingReachable"
    | "AwaitingClusterToken"
    | "ConfigWritten"
    | "Initializing"
    | "Joining"
    | "APIReady"
    | "SecretsSeeded"
    | "AddonsApplied"
    | "Ready"
    | "NodeReady"
    | "Failed";

export const initiatorPhases: readonly Phase[] = [
    "NotStarted", "Installing", "Rebooting", "AwaitingReachable", "ConfigWritten",
    "Initializing", "APIReady", "SecretsSeeded", "AddonsApplied", "Ready",
];

export const serverJoinerPhases: readonly Phase[] = [
    "NotStarted", "Installing", "Rebooting", "AwaitingReachable", "AwaitingClusterToken",
    "ConfigWritten", "Joining", "APIReady", "NodeReady",
];

export const agentJoinerPhases: readonly Phase[] = [
    "NotStarted", "Installing", "Rebooting", "AwaitingReachable", "AwaitingClusterToken",
    "ConfigWritten", "Joining", "NodeReady",
];

export function phasesFor(role: NodeRole): readonly Phase[] {
    switch (role) {
        case "first-control-plane":
            return initiatorPhases;
        case "control-plane":
            return serverJoinerPhases;
        case "agent":
            return agentJoinerPhases;
    }
}

export interface PhaseRecord {
    phase: Phase;
    at: Date;
}

export interface FailureRecord {
    kind: BootstrapErrorKind;
    message: string;
    // Phase the node was in when it failed.
    phase: Phase;
}

// Progress of one node's task. Written only by that task; phases move forward
// along the role's list and may skip steps that a previous run already did.
export class ProvisioningState {
    private current: Phase = "NotStarted";
    private failure?: FailureRecord;
    private retryCount = 0;
    readonly history: PhaseRecord[] = [{phase: "NotStarted", at: new Date()}];
    // Errors recorded without failing the node, such as a failed add-on apply.
    readonly warnings: FailureRecord[] = [];
    private readonly order: readonly Phase[];

    constructor(readonly node: string, readonly role: NodeRole, private readonly onChange?: (state: ProvisioningState) => void) {
        this.order = phasesFor(role);
    }

    get phase(): Phase {
        return this.current;
    }

    get error(): FailureRecord | undefined {
        return this.failure;
    }

    get retries(): number {
        return this.retryCount;
    }

    get terminal(): boolean {
        return this.current === "Failed" || this.current === this.order[this.order.length - 1];
    }

    get ready(): boolean {
        return this.current === "Ready" || this.current === "NodeReady";
    }

    // Whether the node got at least as far as `phase`, counting the phase it failed in.
    reached(phase: Phase): boolean {
        const target = this.order.indexOf(phase);
        if (target < 0) return false;
        const at = this.current === "Failed" && this.failure ? this.failure.phase : this.current;
        return this.order.indexOf(at) >= target;
    }

    advance(to: Phase): void {
        if (this.current === "Failed") {
            throw new Error(`${this.node} already failed, cannot move to ${to}`);
        }
        const from = this.order.indexOf(this.current);
        const next = this.order.indexOf(to);
        if (next < 0) throw new Error(`${to} is not a phase of a ${this.role} node`);
        if (next <= from) throw new Error(`${this.node} cannot move back from ${this.current} to ${to}`);

        this.current = to;
        this.history.push({phase: to, at: new Date()});
        this.onChange?.(this);
    }

    retried(): void {
        this.retryCount++;
    }

    warn(error: BootstrapError): void {
        this.warnings.push({kind: error.kind, message: error.message, phase: this.current});
    }

    fail(error: BootstrapError): void {
        if (this.terminal) return;
        this.failure = {kind: error.kind, message: error.message, phase: this.current};
        this.current = "Failed";
        this.history.push({phase: "Failed", at: new Date()});
        this.onChange?.(this);
    }
}
