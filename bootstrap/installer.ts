import {Commands, Paths} from "../hcloud/commands";
import {runsMicroOS} from "./checks";
import {advance, gate, retrying, TaskContext} from "./context";
import {BootstrapError, isCancelled, toBootstrapError} from "./errors";
import {run} from "./executor";
import {requireReady} from "./readiness";
import {renderIgnition} from "./render";

// Writes MicroOS onto a node booted into the rescue system and reboots it.
//
// A node that already runs MicroOS (a rerun after a partial bootstrap) is
// left alone and only checked for reachability.
export class ImageInstaller {
    constructor(private readonly ctx: TaskContext) {
    }

    async install(): Promise<void> {
        const {ctx} = this;
        advance(ctx, "Installing");

        const installed = await retrying(ctx, () => runsMicroOS(ctx.executor, ctx.node)(ctx.signal));
        if (installed) {
            ctx.logger.info(`${ctx.node.name} already runs MicroOS, skipping the image install`);
        } else {
            await retrying(ctx, () => this.writeImage());
            advance(ctx, "Rebooting");
            await this.reboot();
        }

        advance(ctx, "AwaitingReachable");
        await retrying(ctx, () => requireReady(
            runsMicroOS(ctx.executor, ctx.node),
            gate(ctx, ctx.config.timeouts.reboot, "MicroOS to boot"),
            "RebootTimeout",
        ));
    }

    private async writeImage(): Promise<void> {
        const {ctx} = this;
        try {
            await ctx.executor.upload(ctx.node, renderIgnition(ctx.config, ctx.node), Paths.ignition, {signal: ctx.signal});
            await run(ctx.executor, ctx.node, [Commands.installImage(ctx.config.osImageUrl)], "InstallFailure", {signal: ctx.signal});
        } catch (err) {
            const error = toBootstrapError(err, "InstallFailure");
            if (error.transient || isCancelled(error)) throw error;
            throw new BootstrapError("InstallFailure", `installing MicroOS on ${ctx.node.name} failed: ${error.message}`, {cause: error});
        }
    }

    private async reboot(): Promise<void> {
        const {ctx} = this;
        try {
            await ctx.executor.execute(ctx.node, [Commands.reboot()], {signal: ctx.signal});
        } catch (err) {
            const error = toBootstrapError(err, "ConnectionError");
            if (error.kind !== "ConnectionError") throw error;
            // The host may drop the session while going down.
            ctx.logger.debug({err: error.message}, `${ctx.node.name} closed the connection on reboot`);
        }
    }
}
