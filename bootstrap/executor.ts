import {NodeSpec} from "../hcloud/settings";
import {BootstrapError} from "./errors";

// RunCommandResult is the result of running a command.
export interface RunCommandResult {
    // The stdout of the command that was executed.
    stdout: string;
    // The stderr of the command that was executed.
    stderr: string;
    // The exit code of the command that was executed.
    code: number;
}

export interface ExecOptions {
    signal?: AbortSignal;
}

// RemoteExecutor runs commands on, and copies files to, a declared node.
// Commands that exit non-zero resolve with their code; failing to reach the node rejects with a ConnectionError.
export interface RemoteExecutor {
    execute(node: NodeSpec, commands: string[], options?: ExecOptions): Promise<RunCommandResult>;
    upload(node: NodeSpec, content: string, destination: string, options?: ExecOptions): Promise<void>;
}

// Runs the commands and throws a BootstrapError of the given kind when they exit non-zero.
export async function run(
    executor: RemoteExecutor,
    node: NodeSpec,
    commands: string[],
    kind: BootstrapError["kind"],
    options?: ExecOptions,
): Promise<RunCommandResult> {
    const result = await executor.execute(node, commands, options);
    if (result.code !== 0) {
        throw new BootstrapError(kind, `command on ${node.name} exited with ${result.code}: ${tail(result.stderr || result.stdout)}`);
    }
    return result;
}

function tail(output: string, lines = 5): string {
    return output.trimEnd().split("\n").slice(-lines).join("\n");
}
