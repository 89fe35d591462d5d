import pino from "pino";
import {parse} from "yaml";
import {z} from "zod";
import {BootstrapError} from "../bootstrap/errors";
import {ExecOptions, RemoteExecutor, RunCommandResult} from "../bootstrap/executor";
import {ClusterConfig, NodeRole, NodeSpec, parseClusterSettings, parseNodes} from "../hcloud/settings";

export const silentLogger = pino({level: "silent"});

export function testConfig(overrides: Record<string, unknown> = {}): ClusterConfig {
    return {
        ...parseClusterSettings({
            name: "test",
            networkName: "k8s",
            sshAuthorizedKeys: ["ssh-ed25519 AAAAtestkey admin@example.com"],
            timeouts: {pollInterval: 5, reboot: 500, api: 500, nodeReady: 500},
            retries: 2,
            ...overrides,
        }),
        hcloudToken: "test-hcloud-token",
    };
}

export function testNodes(controlPlanes: number, agents: number): NodeSpec[] {
    const nodes: {name: string, role: NodeRole, location: string, serverType: string, privateIp: string, host: string}[] = [];
    for (let i = 1; i <= controlPlanes; i++) {
        nodes.push({
            name: `cp-${i}`,
            role: i === 1 ? "first-control-plane" : "control-plane",
            location: "fsn1",
            serverType: "cpx21",
            privateIp: `10.0.1.${i}`,
            host: `192.0.2.${i}`,
        });
    }
    for (let i = 1; i <= agents; i++) {
        nodes.push({
            name: `agent-${i}`,
            role: "agent",
            location: "fsn1",
            serverType: "cpx31",
            privateIp: `10.0.2.${i}`,
            host: `192.0.2.${100 + i}`,
        });
    }
    return parseNodes(nodes);
}

interface FakeNode {
    os: "rescue" | "microos";
    staged: boolean;
    running?: "server" | "agent";
    unreachableUntil: number;
    files: Map<string, string>;
}

export interface ExecCall {
    node: string;
    command: string;
}

const secretManifestSchema = z.object({
    metadata: z.object({name: z.string(), namespace: z.string()}),
    data: z.record(z.string(), z.string()),
});
const secretPatchSchema = z.object({data: z.record(z.string(), z.string())});

type Handler = (node: FakeNode, spec: NodeSpec, match: RegExpExecArray) => Promise<Partial<RunCommandResult>> | Partial<RunCommandResult>;

// In-process stand-in for a set of Hetzner servers: tracks each node's OS,
// k3s service and files, and the secrets and applies of the cluster they form.
export class FakeCluster implements RemoteExecutor {
    readonly calls: ExecCall[] = [];
    readonly secrets = new Map<string, Record<string, string>>();
    readonly applied: Map<string, string>[] = [];
    secretCreates = 0;
    secretPatches = 0;

    // Nodes whose image install exits non-zero.
    readonly failInstall = new Set<string>();
    // Milliseconds a node refuses connections after a reboot.
    readonly unreachableAfterReboot = new Map<string, number>();
    // Awaited before a node's image install runs.
    readonly beforeInstall = new Map<string, () => Promise<void>>();
    // Awaited before a node's k3s service starts.
    readonly beforeStart = new Map<string, () => Promise<void>>();
    failApply = false;
    failSecretCreate = false;
    // Drops the connection on `rm -f`.
    failRemove = false;

    private readonly nodes = new Map<string, FakeNode>();
    private readonly handlers: [RegExp, Handler][] = [
        [/^grep -q '\^ID="opensuse-microos"' \/etc\/os-release$/, n => ({code: n.os === "microos" ? 0 : 1})],
        [/^set -ex\n/, async (n, spec) => {
            await this.beforeInstall.get(spec.name)?.();
            if (this.failInstall.has(spec.name)) return {code: 1, stderr: "qemu-img: Could not open '/dev/sda'"};
            n.staged = true;
            return {code: 0};
        }],
        [/^\(sleep 2; reboot\)&$/, (n, spec) => {
            if (n.staged) n.os = "microos";
            n.unreachableUntil = Date.now() + (this.unreachableAfterReboot.get(spec.name) ?? 0);
            return {code: 0};
        }],
        [/^cat (\S+) 2>\/dev\/null \|\| true$/, (n, _spec, m) => ({stdout: n.files.get(m[1]) ?? ""})],
        [/^mkdir -p \S+$/, () => ({code: 0})],
        [/^rm -f (\S+)$/, (n, spec, m) => {
            if (this.failRemove) throw new BootstrapError("ConnectionError", `connection to ${spec.name} lost: read ECONNRESET`);
            n.files.delete(m[1]);
            return {code: 0};
        }],
        [/^curl -sfL https:\/\/get\.k3s\.io \| .*INSTALL_K3S_EXEC=(server|agent) sh -$/, () => ({code: 0})],
        [/^\/sbin\/restorecon /, () => ({code: 0})],
        [/^systemctl start (k3s|k3s-agent)$/, async (n, spec, m) => {
            await this.beforeStart.get(spec.name)?.();
            n.running = m[1] === "k3s" ? "server" : "agent";
            return {code: 0};
        }],
        [/^kubectl get --raw='\/readyz'$/, n => n.running === "server" ? {stdout: "ok"} : {code: 1, stderr: "The connection to the server was refused"}],
        [/^kubectl get node (\S+) -o jsonpath=/, (_n, _spec, m) => ({stdout: this.byName(m[1])?.running ? "True" : ""})],
        [/^kubectl -n (\S+) get secret (\S+) --ignore-not-found -o jsonpath='\{\.data\}'$/, (_n, _spec, m) => {
            const data = this.secrets.get(`${m[1]}/${m[2]}`);
            return {stdout: data ? JSON.stringify(data) : ""};
        }],
        [/^kubectl create -f (\S+)$/, (n, _spec, m) => {
            const manifest = secretManifestSchema.parse(parse(n.files.get(m[1]) ?? ""));
            const key = `${manifest.metadata.namespace}/${manifest.metadata.name}`;
            if (this.failSecretCreate) return {code: 1, stderr: "error: failed to create secret: etcdserver: request timed out"};
            if (this.secrets.has(key)) return {code: 1, stderr: `secrets "${manifest.metadata.name}" already exists`};
            this.secrets.set(key, manifest.data);
            this.secretCreates++;
            return {code: 0};
        }],
        [/^kubectl -n (\S+) patch secret (\S+) --type merge --patch-file (\S+)$/, (n, _spec, m) => {
            const patch = secretPatchSchema.parse(JSON.parse(n.files.get(m[3]) ?? "{}"));
            const key = `${m[1]}/${m[2]}`;
            this.secrets.set(key, {...this.secrets.get(key), ...patch.data});
            this.secretPatches++;
            return {code: 0};
        }],
        [/^kubectl apply -k (\S+)$/, (n, _spec, m) => {
            if (this.failApply) return {code: 1, stderr: "error: accumulating resources"};
            const files = new Map([...n.files].filter(([path]) => path.startsWith(`${m[1]}/`) && !path.endsWith("/.applied")));
            this.applied.push(files);
            return {code: 0};
        }],
    ];

    constructor(specs: NodeSpec[], os: "rescue" | "microos" = "rescue") {
        for (const spec of specs) {
            this.nodes.set(spec.name, {os, staged: false, unreachableUntil: 0, files: new Map()});
        }
    }

    node(name: string): FakeNode {
        const node = this.nodes.get(name);
        if (!node) throw new Error(`unknown node ${name}`);
        return node;
    }

    file(node: string, path: string): string | undefined {
        return this.node(node).files.get(path);
    }

    commandsOn(node: string): string[] {
        return this.calls.filter(c => c.node === node).map(c => c.command);
    }

    private byName(name: string): FakeNode | undefined {
        return this.nodes.get(name);
    }

    private reach(spec: NodeSpec, options?: ExecOptions): FakeNode {
        if (options?.signal?.aborted) throw new BootstrapError("Cancelled", `cancelled while talking to ${spec.name}`);
        const node = this.node(spec.name);
        if (Date.now() < node.unreachableUntil) {
            throw new BootstrapError("ConnectionError", `cannot reach ${spec.name} at ${spec.host}: connect ECONNREFUSED`);
        }
        return node;
    }

    async execute(spec: NodeSpec, commands: string[], options?: ExecOptions): Promise<RunCommandResult> {
        const node = this.reach(spec, options);
        let stdout = "";
        let stderr = "";
        for (const command of commands) {
            this.calls.push({node: spec.name, command});
            const handler = this.handlers.find(([pattern]) => pattern.test(command));
            if (!handler) throw new Error(`unexpected command on ${spec.name}: ${command}`);
            const match = handler[0].exec(command);
            if (!match) throw new Error(`unexpected command on ${spec.name}: ${command}`);
            const result = await handler[1](node, spec, match);
            stdout += result.stdout ?? "";
            stderr += result.stderr ?? "";
            const code = result.code ?? 0;
            if (code !== 0) return {stdout, stderr, code};
        }
        return {stdout, stderr, code: 0};
    }

    async upload(spec: NodeSpec, content: string, destination: string, options?: ExecOptions): Promise<void> {
        const node = this.reach(spec, options);
        node.files.set(destination, content);
    }
}
