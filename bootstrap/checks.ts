import {Commands} from "../hcloud/commands";
import {NodeSpec} from "../hcloud/settings";
import {RemoteExecutor} from "./executor";

export type Check = (signal?: AbortSignal) => Promise<boolean>;

// The rescue system is not MicroOS, so this only passes once the installed OS has booted.
export function runsMicroOS(executor: RemoteExecutor, node: NodeSpec): Check {
    return async (signal) => (await executor.execute(node, [Commands.isMicroOS()], {signal})).code === 0;
}

// The readiness endpoint answers with the literal "ok"; trailing newlines are dropped as a shell would.
export function apiReady(executor: RemoteExecutor, node: NodeSpec): Check {
    return async (signal) => {
        const result = await executor.execute(node, [Commands.readyz()], {signal});
        return result.code === 0 && result.stdout.replace(/\n+$/, "") === "ok";
    };
}

// Asks the API on `apiNode` for the Ready condition of `nodeName`.
export function nodeReady(executor: RemoteExecutor, apiNode: NodeSpec, nodeName: string): Check {
    return async (signal) => {
        const result = await executor.execute(apiNode, [Commands.nodeReadyStatus(nodeName)], {signal});
        return result.code === 0 && result.stdout.trim() === "True";
    };
}
