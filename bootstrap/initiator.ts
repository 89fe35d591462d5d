import {randomBytes} from "crypto";
import {parse} from "yaml";
import {z} from "zod";
import {Commands, Paths} from "../hcloud/commands";
import {NodeSpec} from "../hcloud/settings";
import {ApplyOutcome, clusterSecrets, PostInstallApplier} from "./addons";
import {WriteOnceCell} from "./cell";
import {apiReady, nodeReady} from "./checks";
import {advance, gate, retrying, TaskContext} from "./context";
import {BootstrapError, toBootstrapError} from "./errors";
import {run} from "./executor";
import {ImageInstaller} from "./installer";
import {requireReady} from "./readiness";
import {ClusterToken, render} from "./render";

// What the first control plane hands to every joiner once the cluster is up.
export interface ClusterHandoff {
    token: ClusterToken;
    // Private address joiners register against.
    serverAddress: string;
    // Node whose API answers readiness questions about the others.
    apiNode: NodeSpec;
}

const existingConfigSchema = z.object({token: z.string().min(1)}).passthrough();

export function generateToken(): ClusterToken {
    return randomBytes(48).toString("hex");
}

// Drives the first control plane from a rescue-booted machine to a running
// cluster, then publishes the token and its address on the handoff cell.
// Any failure fails the cell, so that no joiner ever proceeds.
export class ClusterInitiator {
    constructor(
        private readonly ctx: TaskContext,
        private readonly handoff: WriteOnceCell<ClusterHandoff>,
        private readonly addonsApplied: WriteOnceCell<ApplyOutcome>,
        private readonly applier: PostInstallApplier,
    ) {
    }

    async run(): Promise<ClusterHandoff> {
        try {
            return await this.initiate();
        } catch (err) {
            const error = toBootstrapError(err, "CommandFailure");
            this.ctx.state.fail(error);
            this.handoff.fail(error);
            throw error;
        }
    }

    private async initiate(): Promise<ClusterHandoff> {
        const {ctx} = this;
        const {node, config, executor, signal} = ctx;

        await new ImageInstaller(ctx).install();

        const token = await this.resolveToken();
        const rendered = render("first-control-plane", config, token, node);
        await retrying(ctx, async () => {
            await run(executor, node, [Commands.makeDir(Paths.k3sConfigDir)], "CommandFailure", {signal});
            await executor.upload(node, rendered.config, Paths.k3sConfig, {signal});
        });
        advance(ctx, "ConfigWritten");

        advance(ctx, "Initializing");
        await run(executor, node, [...Commands.installK3s(config.k3sChannel, "server"), Commands.startK3s("server")], "CommandFailure", {signal});
        await requireReady(apiReady(executor, node), gate(ctx, config.timeouts.api, "k3s API"), "InitializationTimeout");
        advance(ctx, "APIReady");

        await this.applier.seedSecrets(node, clusterSecrets(config), {signal});
        advance(ctx, "SecretsSeeded");

        await this.applyAddons(rendered.manifests);

        await requireReady(nodeReady(executor, node, node.name), gate(ctx, config.timeouts.nodeReady, "node Ready"), "Timeout");
        advance(ctx, "Ready");

        const handoff: ClusterHandoff = {token, serverAddress: node.privateIp, apiNode: node};
        this.handoff.set(handoff);
        ctx.logger.info({server: handoff.serverAddress}, "cluster initiated, joiners released");
        return handoff;
    }

    // A failed apply is recorded on the node but does not fail it.
    private async applyAddons(manifests: Record<string, string>): Promise<void> {
        const {ctx} = this;
        if (this.addonsApplied.isSet) return;
        try {
            const outcome = await this.applier.apply(ctx.node, manifests, {signal: ctx.signal});
            this.addonsApplied.set(outcome);
            advance(ctx, "AddonsApplied");
        } catch (err) {
            const error = toBootstrapError(err, "AddonApplyFailure");
            if (error.kind === "Cancelled") throw error;
            ctx.state.warn(error);
            ctx.logger.error({kind: error.kind}, error.message);
        }
    }

    // Reuses the token of an earlier run so that nodes that already joined stay valid.
    private async resolveToken(): Promise<ClusterToken> {
        const {ctx} = this;
        if (ctx.config.clusterToken) return ctx.config.clusterToken;

        const existing = await retrying(ctx, () =>
            run(ctx.executor, ctx.node, [Commands.readFile(Paths.k3sConfig)], "CommandFailure", {signal: ctx.signal}));
        if (existing.stdout.trim() !== "") {
            let document: unknown;
            try {
                document = parse(existing.stdout);
            } catch (err) {
                throw new BootstrapError("CommandFailure", `unreadable ${Paths.k3sConfig} on ${ctx.node.name}`, {cause: err});
            }
            const previous = existingConfigSchema.safeParse(document);
            if (previous.success) {
                ctx.logger.info("reusing the cluster token of a previous run");
                return previous.data.token;
            }
        }
        return generateToken();
    }
}
