import {Logger} from "pino";
import {ClusterConfig, NodeSpec} from "../hcloud/settings";
import {RemoteExecutor} from "./executor";
import {GateOptions, retry} from "./readiness";
import {Phase, ProvisioningState} from "./state";

// Everything one node's task needs; nothing in here is shared for writing with other tasks.
export interface TaskContext {
    node: NodeSpec;
    config: Readonly<ClusterConfig>;
    executor: RemoteExecutor;
    state: ProvisioningState;
    logger: Logger;
    signal: AbortSignal;
}

export function gate(ctx: TaskContext, timeout: number, description: string): GateOptions {
    return {
        interval: ctx.config.timeouts.pollInterval,
        timeout,
        signal: ctx.signal,
        description: `${description} on ${ctx.node.name}`,
    };
}

export function advance(ctx: TaskContext, phase: Phase): void {
    ctx.state.advance(phase);
    ctx.logger.info({phase}, `${ctx.node.name} entered ${phase}`);
}

// Retries transient failures (connection gaps, reboot timeouts) within the configured budget.
export function retrying<T>(ctx: TaskContext, operation: () => Promise<T>): Promise<T> {
    return retry(operation, {
        attempts: ctx.config.retries,
        signal: ctx.signal,
        onRetry: (err, attempt) => {
            ctx.state.retried();
            ctx.logger.warn({kind: err.kind, attempt}, `${ctx.node.name}: ${err.message}, retrying`);
        },
    });
}
