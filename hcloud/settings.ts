import {z} from "zod";
import {BootstrapError} from "../bootstrap/errors";

export const nodeRoles = ["first-control-plane", "control-plane", "agent"] as const;
export type NodeRole = typeof nodeRoles[number];

const hostname = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export const nodeSpecSchema = z.object({
    name: z.string().max(63).regex(hostname, "must be a lowercase RFC 1123 label"),
    role: z.enum(nodeRoles),
    location: z.string().min(1),
    serverType: z.string().min(1),
    // Address on the private network, used by k3s and flannel.
    privateIp: z.string().ip({version: "v4"}),
    // Address the orchestrator reaches over SSH.
    host: z.string().min(1),
    port: z.number().int().positive().optional(),
}).strict();

export type NodeSpec = Readonly<z.infer<typeof nodeSpecSchema>>;

export const nodeListSchema = z.array(nodeSpecSchema).min(1).superRefine((nodes, ctx) => {
    const initiators = nodes.filter(n => n.role === "first-control-plane");
    if (initiators.length !== 1) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `exactly one node must have role first-control-plane, found ${initiators.length}`,
        });
    }
    for (const key of ["name", "privateIp"] as const) {
        const seen = new Set<string>();
        nodes.forEach((node, index) => {
            if (seen.has(node[key])) {
                ctx.addIssue({code: z.ZodIssueCode.custom, path: [index, key], message: `duplicate ${key} ${node[key]}`});
            }
            seen.add(node[key]);
        });
    }
});

export const addonSettingsSchema = z.object({
    ccmVersion: z.string().default("v1.12.1"),
    csiVersion: z.string().default("v1.6.0"),
    kuredVersion: z.string().default("1.10.1"),
    traefikVersion: z.string().optional(),
    // Hetzner load balancer type the ingress service asks for.
    loadBalancerType: z.string().default("lb11"),
    // Additional kustomize resources (URLs or file names below).
    extraResources: z.array(z.string()).default([]),
    // File name → manifest text, uploaded beside the kustomization and listed as resources.
    extraManifests: z.record(z.string(), z.string()).default({}),
    // File name → strategic merge patch text.
    extraPatches: z.record(z.string(), z.string()).default({}),
}).strict();

export const timeoutSettingsSchema = z.object({
    pollInterval: z.number().int().positive().default(2_000),
    reboot: z.number().int().positive().default(5 * 60_000),
    api: z.number().int().positive().default(5 * 60_000),
    nodeReady: z.number().int().positive().default(5 * 60_000),
}).strict();

export const clusterSettingsSchema = z.object({
    name: z.string().regex(hostname).default("k3s"),
    k3sChannel: z.string().default("stable"),
    allowSchedulingOnControlPlane: z.boolean().default(false),
    flannelIface: z.string().default("eth1"),
    disable: z.array(z.string()).default(["local-storage", "traefik", "servicelb"]),
    osImageUrl: z.string().url()
        .default("https://download.opensuse.org/tumbleweed/appliances/openSUSE-MicroOS.x86_64-OpenStack-Cloud.qcow2.meta4"),
    sshAuthorizedKeys: z.array(z.string()).default([]),
    // Name of the Hetzner private network the cloud controller routes through.
    networkName: z.string().min(1),
    addons: addonSettingsSchema.default({}),
    timeouts: timeoutSettingsSchema.default({}),
    // Tries per transient step (reboot wait, connection gaps), including the first.
    retries: z.number().int().min(1).default(3),
    concurrency: z.number().int().min(1).default(5),
    onQuorumLost: z.enum(["continue", "abort"]).default("continue"),
    // When false, a cluster secret that exists with different content is a SecretConflict instead of being patched.
    overwriteSecrets: z.boolean().default(true),
    logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
}).strict();

export type ClusterSettings = z.infer<typeof clusterSettingsSchema>;
export type AddonSettings = ClusterSettings["addons"];

export interface ClusterConfig extends ClusterSettings {
    // API token handed to the cloud controller and the CSI driver.
    hcloudToken: string;
    // Shared join secret; generated on the first control plane when absent.
    clusterToken?: string;
}

function invalid(what: string, error: z.ZodError): BootstrapError {
    const issues = error.issues.map(i => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`);
    return new BootstrapError("InvalidSettings", `invalid ${what}: ${issues.join("; ")}`, {cause: error});
}

export function parseClusterSettings(raw: unknown): ClusterSettings {
    const result = clusterSettingsSchema.safeParse(raw);
    if (!result.success) throw invalid("cluster settings", result.error);
    return result.data;
}

export function parseNodes(raw: unknown): NodeSpec[] {
    const result = nodeListSchema.safeParse(raw);
    if (!result.success) throw invalid("node list", result.error);
    return result.data.map(n => Object.freeze(n));
}

export function isControlPlane(node: NodeSpec): boolean {
    return node.role !== "agent";
}
