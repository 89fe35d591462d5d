import {Commands, K3sExec, Paths} from "../hcloud/commands";
import {WriteOnceCell} from "./cell";
import {apiReady, nodeReady} from "./checks";
import {advance, gate, retrying, TaskContext} from "./context";
import {BootstrapError, toBootstrapError} from "./errors";
import {run} from "./executor";
import {ClusterHandoff} from "./initiator";
import {ImageInstaller} from "./installer";
import {requireReady} from "./readiness";
import {render} from "./render";

// Joins a control-plane or agent node to the cluster the initiator published.
//
// The node is prepared independently of the initiator; only the join waits
// for the handoff. `prepare` and `join` are split so the orchestrator can
// release the node's worker slot while it waits.
export class NodeJoiner {
    constructor(private readonly ctx: TaskContext, private readonly handoff: WriteOnceCell<ClusterHandoff>) {
    }

    async run(): Promise<void> {
        await this.prepare();
        await this.join(await this.awaitHandoff());
    }

    async prepare(): Promise<void> {
        await this.guard(() => new ImageInstaller(this.ctx).install());
    }

    // Suspends until the initiator publishes; it never fails on its own, only if the initiator did.
    async awaitHandoff(): Promise<ClusterHandoff> {
        return this.guard(async () => {
            advance(this.ctx, "AwaitingClusterToken");
            try {
                return await this.handoff.wait(this.ctx.signal);
            } catch (err) {
                const error = toBootstrapError(err, "Cancelled");
                throw new BootstrapError("Cancelled", `${this.ctx.node.name} will not join: ${error.message}`, {cause: error});
            }
        });
    }

    async join(handoff: ClusterHandoff): Promise<void> {
        await this.guard(() => this.joinCluster(handoff));
    }

    private async joinCluster(handoff: ClusterHandoff): Promise<void> {
        const {ctx} = this;
        const {node, config, executor, signal} = ctx;
        if (!this.handoff.isSet) {
            throw new BootstrapError("JoinPreconditionUnmet", `${node.name} reached the join step before the cluster token was published`);
        }
        const exec: K3sExec = node.role === "agent" ? "agent" : "server";

        const rendered = render(node.role, config, handoff.token, node, handoff.serverAddress);
        await retrying(ctx, async () => {
            await run(executor, node, [Commands.makeDir(Paths.k3sConfigDir)], "CommandFailure", {signal});
            await executor.upload(node, rendered.config, Paths.k3sConfig, {signal});
        });
        advance(ctx, "ConfigWritten");

        advance(ctx, "Joining");
        await run(executor, node, [...Commands.installK3s(config.k3sChannel, exec), Commands.startK3s(exec)], "CommandFailure", {signal});

        if (exec === "server") {
            await requireReady(apiReady(executor, node), gate(ctx, config.timeouts.api, "k3s API"), "Timeout");
            advance(ctx, "APIReady");
        }

        await requireReady(nodeReady(executor, handoff.apiNode, node.name), gate(ctx, config.timeouts.nodeReady, "node Ready"), "Timeout");
        advance(ctx, "NodeReady");
    }

    private async guard<T>(step: () => Promise<T>): Promise<T> {
        try {
            return await step();
        } catch (err) {
            const error = toBootstrapError(err, "CommandFailure");
            this.ctx.state.fail(error);
            throw error;
        }
    }
}
