import {stringify} from "yaml";
import {ClusterConfig, NodeRole, NodeSpec} from "../hcloud/settings";
import {BootstrapError} from "./errors";

export type ClusterToken = string;

// File name → content of everything uploaded next to kustomization.yaml.
export type ManifestFiles = Record<string, string>;

export interface ManifestBundle {
    resources: string[];
    patchesStrategicMerge: string[];
    files: ManifestFiles;
}

export interface RenderedNode {
    config: string;
    // Only the first control plane carries the add-on bundle.
    manifests: ManifestFiles;
}

const apiPort = 6443;

const yamlOptions = {lineWidth: 0} as const;

function toYaml(value: unknown): string {
    return normalizeBlockScalars(stringify(value, yamlOptions));
}

export function serverUrl(address: string): string {
    return `https://${address}:${apiPort}`;
}

// Renders the configuration and manifests for one node. Identical inputs give
// byte-identical output; `server` is the initiator's private address and is
// required for every role except the first control plane.
export function render(role: NodeRole, config: ClusterConfig, token: ClusterToken, node: NodeSpec, server?: string): RenderedNode {
    const rendered = renderNodeConfig(role, config, token, node, server);
    if (role !== "first-control-plane") return {config: rendered, manifests: {}};
    return {config: rendered, manifests: renderManifestBundle(config, node).files};
}

export function renderNodeConfig(role: NodeRole, config: ClusterConfig, token: ClusterToken, node: NodeSpec, server?: string): string {
    if (!token) {
        throw new BootstrapError("ConfigRenderError", `no cluster token to render the config of ${node.name}`);
    }
    if (role !== "first-control-plane" && !server) {
        throw new BootstrapError("ConfigRenderError", `${node.name} joins a cluster but no server address was given`);
    }
    const kubeletArg = ["cloud-provider=external"];

    if (role === "agent") {
        return toYaml({
            "node-name": node.name,
            "server": serverUrl(server ?? ""),
            "token": token,
            "flannel-iface": config.flannelIface,
            "kubelet-arg": kubeletArg,
            "node-ip": node.privateIp,
        });
    }

    const joining = role === "control-plane" ? {"server": serverUrl(server ?? "")} : {};
    return toYaml({
        "node-name": node.name,
        "cluster-init": role === "first-control-plane",
        ...joining,
        "disable": [...config.disable],
        "disable-cloud-controller": true,
        "flannel-iface": config.flannelIface,
        "kubelet-arg": kubeletArg,
        "node-ip": node.privateIp,
        "advertise-address": node.privateIp,
        "tls-san": [node.privateIp, node.host],
        "token": token,
        "node-taint": config.allowSchedulingOnControlPlane ? [] : ["node-role.kubernetes.io/control-plane:NoSchedule"],
    });
}

// Ignition config the freshly written MicroOS picks up on first boot. The
// transactional-update timer stays off: reboots are scheduled by kured.
export function renderIgnition(config: ClusterConfig, node: NodeSpec): string {
    return JSON.stringify({
        ignition: {version: "3.0.0"},
        passwd: {
            users: [{name: "root", sshAuthorizedKeys: [...config.sshAuthorizedKeys]}],
        },
        storage: {
            files: [{
                path: "/etc/hostname",
                mode: 420,
                overwrite: true,
                contents: {source: `data:,${node.name}`},
            }],
        },
        systemd: {
            units: [{name: "transactional-update.timer", enabled: false}],
        },
    }, null, 2);
}

function traefikChart(config: ClusterConfig, location: string): unknown {
    const values = {
        service: {
            enabled: true,
            type: "LoadBalancer",
            annotations: {
                "load-balancer.hetzner.cloud/name": `${config.name}-traefik`,
                "load-balancer.hetzner.cloud/use-private-ip": "true",
                "load-balancer.hetzner.cloud/location": location,
                "load-balancer.hetzner.cloud/type": config.addons.loadBalancerType,
            },
        },
        additionalArguments: [
            "--entryPoints.web.proxyProtocol.trustedIPs=127.0.0.1/32,10.0.0.0/8",
            "--entryPoints.websecure.proxyProtocol.trustedIPs=127.0.0.1/32,10.0.0.0/8",
        ],
    };
    const version = config.addons.traefikVersion ? {version: config.addons.traefikVersion} : {};
    return {
        apiVersion: "helm.cattle.io/v1",
        kind: "HelmChart",
        metadata: {name: "traefik", namespace: "kube-system"},
        spec: {
            chart: "traefik",
            ...version,
            repo: "https://helm.traefik.io/traefik",
            targetNamespace: "kube-system",
            valuesContent: stringify(values, yamlOptions),
        },
    };
}

const kuredPatch = {
    apiVersion: "apps/v1",
    kind: "DaemonSet",
    metadata: {name: "kured", namespace: "kube-system"},
    spec: {
        template: {
            spec: {
                containers: [{
                    name: "kured",
                    command: [
                        "/usr/bin/kured",
                        "--reboot-sentinel=/var/run/reboot-needed",
                        "--reboot-command=/usr/bin/systemctl reboot",
                        "--lock-ttl=30m",
                    ],
                }],
            },
        },
    },
};

const ccmPatch = {
    apiVersion: "apps/v1",
    kind: "Deployment",
    metadata: {name: "hcloud-cloud-controller-manager", namespace: "kube-system"},
    spec: {
        template: {
            spec: {
                containers: [{
                    name: "hcloud-cloud-controller-manager",
                    command: [
                        "/bin/hcloud-cloud-controller-manager",
                        "--cloud-provider=hcloud",
                        "--leader-elect=false",
                        "--allow-untagged-cloud",
                        "--allocate-node-cidrs=true",
                        "--cluster-cidr=10.42.0.0/16",
                    ],
                }],
            },
        },
    },
};

// The add-on bundle: cloud controller, CSI driver, kured and traefik, plus
// whatever extra manifests and patches the settings carry.
export function renderManifestBundle(config: ClusterConfig, initiator: NodeSpec): ManifestBundle {
    const {ccmVersion, csiVersion, kuredVersion, extraResources, extraManifests, extraPatches} = config.addons;
    const extraManifestNames = Object.keys(extraManifests).sort();
    const extraPatchNames = Object.keys(extraPatches).sort();

    const resources = [
        `https://github.com/hetznercloud/hcloud-cloud-controller-manager/releases/download/${ccmVersion}/ccm-networks.yaml`,
        `https://raw.githubusercontent.com/hetznercloud/csi-driver/${csiVersion}/deploy/kubernetes/hcloud-csi.yml`,
        `https://github.com/weaveworks/kured/releases/download/${kuredVersion}/kured-${kuredVersion}-dockerhub.yaml`,
        "traefik.yaml",
        ...extraResources,
        ...extraManifestNames,
    ];
    const patchesStrategicMerge = ["kured.yaml", "ccm.yaml", ...extraPatchNames];

    const files: ManifestFiles = {
        "kustomization.yaml": toYaml({
            apiVersion: "kustomize.config.k8s.io/v1beta1",
            kind: "Kustomization",
            resources,
            patchesStrategicMerge,
        }),
        "traefik.yaml": toYaml(traefikChart(config, initiator.location)),
        "kured.yaml": toYaml(kuredPatch),
        "ccm.yaml": toYaml(ccmPatch),
    };
    for (const name of extraManifestNames) files[name] = normalizeBlockScalars(extraManifests[name]);
    for (const name of extraPatchNames) files[name] = normalizeBlockScalars(extraPatches[name]);

    return {resources, patchesStrategicMerge, files};
}

const blockHeader = /^(.*?)\|([1-9+-]{0,2})([ \t]*(?:#.*)?)$/;
const validIndicators = /^(?:[1-9][+-]?|[+-][1-9]?)?$/;
const valuePosition = /(?:^[ \t]*|:[ \t]+|(?:^|[ \t])-[ \t]+|^---[ \t]+)$/;

function indentOf(line: string): number {
    return line.length - line.trimStart().length;
}

// Rewrites block literal headers carrying an indentation indicator (`|2`,
// `|2-`, `|-2` ...) to the plain marker, keeping the chomping indicator.
// Only header lines change: the content of every block is copied as is.
export function normalizeBlockScalars(text: string): string {
    const lines = text.split("\n");
    let parentIndent: number | undefined;

    return lines.map(line => {
        if (parentIndent !== undefined) {
            if (line.trim() === "" || indentOf(line) > parentIndent) return line;
            parentIndent = undefined;
        }

        const match = blockHeader.exec(line);
        if (!match) return line;
        const [, prefix, indicators, rest] = match;
        if (!validIndicators.test(indicators) || !valuePosition.test(prefix)) return line;

        parentIndent = indentOf(line);
        const chomping = indicators.replace(/[1-9]/, "");
        return `${prefix}|${chomping}${rest}`;
    }).join("\n");
}
