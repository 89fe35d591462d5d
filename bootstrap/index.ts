import {ClusterConfig, ClusterSettings, parseClusterSettings, parseNodes} from "../hcloud/settings";
import {publicKeyOf, SshExecutor} from "../provisioner/ssh";
import {BootstrapError} from "./errors";
import {createLogger} from "./logger";
import {BootstrapOrchestrator} from "./orchestrator";
import {BootstrapReport, formatReport} from "./report";

export {BootstrapOrchestrator} from "./orchestrator";
export {BootstrapError} from "./errors";
export type {BootstrapReport} from "./report";

// The serializable inputs of a bootstrap run, resolved before the provider runs.
export interface BootstrapInputs {
    settings: unknown;
    nodes: unknown;
    hcloudToken: string;
    clusterToken?: string;
    username: string;
    privateKey: string;
    privateKeyPassphrase?: string;
}

// Freezes the run's config. The key the bootstrap logs in with is always
// authorized, or the node would lock it out after the first reboot.
export function resolveConfig(settings: ClusterSettings, inputs: BootstrapInputs): ClusterConfig {
    const loginKey = publicKeyOf(inputs.privateKey, inputs.privateKeyPassphrase);
    const keyBody = (line: string) => line.trim().split(/\s+/).slice(0, 2).join(" ");
    const authorized = settings.sshAuthorizedKeys.some(k => keyBody(k) === loginKey)
        ? settings.sshAuthorizedKeys
        : [loginKey, ...settings.sshAuthorizedKeys];
    return Object.freeze({
        ...settings,
        sshAuthorizedKeys: authorized,
        hcloudToken: inputs.hcloudToken,
        clusterToken: inputs.clusterToken,
    });
}

// Validates the inputs, bootstraps the cluster over SSH and returns the report.
// Throws, with the report table in the message, when the run did not succeed.
export async function runBootstrap(inputs: BootstrapInputs): Promise<BootstrapReport> {
    const settings = parseClusterSettings(inputs.settings);
    const nodes = parseNodes(inputs.nodes);
    const logger = createLogger(settings.logLevel);
    const config = resolveConfig(settings, inputs);
    const executor = new SshExecutor({
        username: inputs.username,
        privateKey: inputs.privateKey,
        privateKeyPassphrase: inputs.privateKeyPassphrase,
        logger: logger.child({component: "ssh"}),
    });

    const controller = new AbortController();
    const onSignal = () => controller.abort();
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    let report: BootstrapReport;
    try {
        report = await new BootstrapOrchestrator({config, nodes, executor, logger, signal: controller.signal}).run();
    } finally {
        process.removeListener("SIGINT", onSignal);
        process.removeListener("SIGTERM", onSignal);
    }

    if (report.exitCode !== 0) {
        const initiator = report.nodes.find(n => n.role === "first-control-plane");
        const kind = report.cancelled ? "Cancelled" : initiator?.error?.kind ?? "QuorumLost";
        throw new BootstrapError(kind, `cluster bootstrap failed\n${formatReport(report)}`);
    }
    return report;
}
