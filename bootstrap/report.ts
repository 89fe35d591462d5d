import {NodeRole} from "../hcloud/settings";
import {ApplyOutcome} from "./addons";
import {FailureRecord, Phase, ProvisioningState} from "./state";

export interface NodeReport {
    name: string;
    role: NodeRole;
    phase: Phase;
    retries: number;
    error?: FailureRecord;
    warnings: FailureRecord[];
}

export interface BootstrapReport {
    nodes: NodeReport[];
    controlPlanes: number;
    controlPlanesReady: number;
    quorum: number;
    addons: ApplyOutcome | "not applied";
    cancelled: boolean;
    exitCode: 0 | 1;
}

// Members an etcd cluster of `controlPlanes` needs to keep serving.
export function quorumOf(controlPlanes: number): number {
    return Math.floor(controlPlanes / 2) + 1;
}

export function buildReport(
    states: readonly ProvisioningState[],
    outcome: {addons?: ApplyOutcome, cancelled: boolean},
): BootstrapReport {
    const nodes = states.map(s => ({
        name: s.node,
        role: s.role,
        phase: s.phase,
        retries: s.retries,
        error: s.error,
        warnings: [...s.warnings],
    }));
    const controlPlanes = states.filter(s => s.role !== "agent");
    const controlPlanesReady = controlPlanes.filter(s => s.ready).length;
    const quorum = quorumOf(controlPlanes.length);
    const initiatorReady = states.some(s => s.role === "first-control-plane" && s.ready);

    const failed = outcome.cancelled || !initiatorReady || controlPlanesReady < quorum;
    return {
        nodes,
        controlPlanes: controlPlanes.length,
        controlPlanesReady,
        quorum,
        addons: outcome.addons ?? "not applied",
        cancelled: outcome.cancelled,
        exitCode: failed ? 1 : 0,
    };
}

function describe(node: NodeReport): string {
    const messages = node.error ? [`${node.error.kind} in ${node.error.phase}: ${node.error.message}`] : [];
    node.warnings.forEach(w => messages.push(`warning ${w.kind}: ${w.message}`));
    return messages.length ? messages.join("; ") : "-";
}

export function formatReport(report: BootstrapReport): string {
    const header = ["NODE", "ROLE", "PHASE", "RETRIES", "ERROR"];
    const rows = report.nodes.map(n => [n.name, n.role, n.phase, String(n.retries), describe(n)]);
    const widths = header.map((h, i) => Math.max(h.length, ...rows.map(r => r[i].length)));
    const line = (cells: string[]) => cells
        .map((c, i) => i === cells.length - 1 ? c : c.padEnd(widths[i]))
        .join("  ");

    const summary = `control planes ready: ${report.controlPlanesReady}/${report.controlPlanes} (quorum ${report.quorum}), add-ons: ${report.addons}`
        + (report.cancelled ? ", cancelled" : "");
    return [line(header), ...rows.map(line), summary].join("\n");
}
