import pLimit from "p-limit";
import {Logger} from "pino";
import {ClusterConfig, isControlPlane, NodeSpec} from "../hcloud/settings";
import {ApplyOutcome, PostInstallApplier} from "./addons";
import {WriteOnceCell} from "./cell";
import {TaskContext} from "./context";
import {BootstrapError, toBootstrapError} from "./errors";
import {RemoteExecutor} from "./executor";
import {ClusterHandoff, ClusterInitiator} from "./initiator";
import {NodeJoiner} from "./joiner";
import {BootstrapReport, buildReport, formatReport, quorumOf} from "./report";
import {ProvisioningState} from "./state";

type Limit = ReturnType<typeof pLimit>;

export interface BootstrapOptions {
    config: Readonly<ClusterConfig>;
    nodes: readonly NodeSpec[];
    executor: RemoteExecutor;
    logger: Logger;
    // Aborting it cancels every in-flight task at its next suspension point.
    signal?: AbortSignal;
}

// Provisions every declared node in parallel, up to `concurrency` at a time.
//
// The first control plane is scheduled first. Joiners prepare their node
// independently, then wait on the handoff without holding a worker slot.
// A failed initiator cancels the whole run; other failures stay with their
// node unless `onQuorumLost` is `abort` and quorum became unreachable.
export class BootstrapOrchestrator {
    readonly handoff = new WriteOnceCell<ClusterHandoff>("cluster handoff");
    readonly addonsApplied = new WriteOnceCell<ApplyOutcome>("add-on bundle");
    readonly states: ReadonlyMap<string, ProvisioningState>;

    private readonly controller = new AbortController();
    private readonly initiator: NodeSpec;
    private readonly applier: PostInstallApplier;
    private cancelled = false;

    constructor(private readonly options: BootstrapOptions) {
        const initiators = options.nodes.filter(n => n.role === "first-control-plane");
        if (initiators.length !== 1) {
            throw new BootstrapError("InvalidSettings", `exactly one first-control-plane node is required, found ${initiators.length}`);
        }
        this.initiator = initiators[0];
        this.applier = new PostInstallApplier(options.executor, options.logger.child({component: "post-install"}), {
            overwriteSecrets: options.config.overwriteSecrets,
        });
        this.states = new Map(options.nodes.map(n => [n.name, new ProvisioningState(n.name, n.role)]));
    }

    abort(reason: BootstrapError): void {
        if (this.controller.signal.aborted) return;
        this.options.logger.warn({kind: reason.kind}, `aborting bootstrap: ${reason.message}`);
        this.handoff.fail(reason);
        this.controller.abort(reason);
    }

    async run(): Promise<BootstrapReport> {
        const {config, nodes, logger, signal} = this.options;
        const onExternalAbort = () => {
            this.cancelled = true;
            this.abort(new BootstrapError("Cancelled", "bootstrap run was cancelled by the operator"));
        };
        if (signal?.aborted) onExternalAbort();
        signal?.addEventListener("abort", onExternalAbort, {once: true});

        logger.info({nodes: nodes.length, concurrency: config.concurrency}, "starting bootstrap");
        const limit = pLimit(config.concurrency);
        try {
            await Promise.all([
                this.runInitiator(limit),
                ...nodes.filter(n => n !== this.initiator).map(n => this.runJoiner(limit, n)),
            ]);
        } finally {
            signal?.removeEventListener("abort", onExternalAbort);
        }

        const report = buildReport(nodes.map(n => this.state(n)), {
            addons: this.addonsApplied.peek(),
            cancelled: this.cancelled,
        });
        const level = report.exitCode === 0 ? "info" : "error";
        logger[level]({exitCode: report.exitCode}, `bootstrap finished\n${formatReport(report)}`);
        return report;
    }

    private state(node: NodeSpec): ProvisioningState {
        const state = this.states.get(node.name);
        if (!state) throw new Error(`no provisioning state for ${node.name}`);
        return state;
    }

    private context(node: NodeSpec): TaskContext {
        return {
            node,
            config: this.options.config,
            executor: this.options.executor,
            state: this.state(node),
            logger: this.options.logger.child({node: node.name, role: node.role}),
            signal: this.controller.signal,
        };
    }

    private async runInitiator(limit: Limit): Promise<void> {
        const ctx = this.context(this.initiator);
        const initiator = new ClusterInitiator(ctx, this.handoff, this.addonsApplied, this.applier);
        try {
            await limit(() => {
                this.throwIfAborted();
                return initiator.run();
            });
        } catch (err) {
            const error = this.record(ctx, err);
            this.abort(new BootstrapError(error.kind, `first control plane ${ctx.node.name} failed: ${error.message}`, {cause: error}));
        }
    }

    private async runJoiner(limit: Limit, node: NodeSpec): Promise<void> {
        const ctx = this.context(node);
        const joiner = new NodeJoiner(ctx, this.handoff);
        try {
            await limit(() => {
                this.throwIfAborted();
                return joiner.prepare();
            });
            const handoff = await joiner.awaitHandoff();
            await limit(() => {
                this.throwIfAborted();
                return joiner.join(handoff);
            });
        } catch (err) {
            this.record(ctx, err);
            if (isControlPlane(node)) this.checkQuorum();
        }
    }

    private throwIfAborted(): void {
        if (this.controller.signal.aborted) {
            throw new BootstrapError("Cancelled", "bootstrap run was aborted");
        }
    }

    // Tasks record their own failures; this covers errors thrown before a task got going.
    private record(ctx: TaskContext, err: unknown): BootstrapError {
        const error = toBootstrapError(err, "CommandFailure");
        ctx.state.fail(error);
        const level = error.kind === "Cancelled" ? "warn" : "error";
        ctx.logger[level]({kind: error.kind, phase: ctx.state.error?.phase}, error.message);
        return error;
    }

    private checkQuorum(): void {
        if (this.options.config.onQuorumLost !== "abort") return;
        const controlPlanes = [...this.states.values()].filter(s => s.role !== "agent");
        const lost = controlPlanes.filter(s => s.phase === "Failed").length;
        const quorum = quorumOf(controlPlanes.length);
        if (controlPlanes.length - lost < quorum) {
            this.abort(new BootstrapError("QuorumLost",
                `${lost} of ${controlPlanes.length} control planes failed, quorum of ${quorum} is out of reach`));
        }
    }
}
