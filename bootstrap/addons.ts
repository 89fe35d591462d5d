import {Logger} from "pino";
import {stringify} from "yaml";
import {z} from "zod";
import {Commands, Paths} from "../hcloud/commands";
import {getFilesHash} from "../hcloud/hash";
import {ClusterConfig, NodeSpec} from "../hcloud/settings";
import {BootstrapError, toBootstrapError} from "./errors";
import {ExecOptions, RemoteExecutor, run} from "./executor";
import {ManifestFiles} from "./render";

export interface ClusterSecret {
    namespace: string;
    name: string;
    // Plain-text values; encoded on the way to the cluster.
    data: Record<string, string>;
}

export type SecretOutcome = "created" | "unchanged" | "patched";
export type ApplyOutcome = "applied" | "unchanged";

export interface PostInstallOptions {
    overwriteSecrets: boolean;
}

export function clusterSecrets(config: Pick<ClusterConfig, "hcloudToken" | "networkName">): ClusterSecret[] {
    return [
        {namespace: "kube-system", name: "hcloud", data: {token: config.hcloudToken, network: config.networkName}},
        {namespace: "kube-system", name: "hcloud-csi", data: {token: config.hcloudToken}},
    ];
}

const secretDataSchema = z.record(z.string(), z.string());

function encode(data: Record<string, string>): Record<string, string> {
    const encoded: Record<string, string> = {};
    for (const key of Object.keys(data).sort()) {
        encoded[key] = Buffer.from(data[key], "utf8").toString("base64");
    }
    return encoded;
}

function sameData(existing: Record<string, string>, wanted: Record<string, string>): boolean {
    const keys = Object.keys(wanted);
    return keys.length === Object.keys(existing).length && keys.every(k => existing[k] === wanted[k]);
}

// Seeds the cluster secrets and applies the add-on bundle on the first control plane.
//
// Both operations converge: secrets are upserted, and the bundle is applied
// only when its hash differs from the one recorded by the last apply.
export class PostInstallApplier {
    constructor(
        private readonly executor: RemoteExecutor,
        private readonly logger: Logger,
        private readonly options: PostInstallOptions,
    ) {
    }

    async seedSecrets(node: NodeSpec, secrets: ClusterSecret[], options?: ExecOptions): Promise<Record<string, SecretOutcome>> {
        const outcomes: Record<string, SecretOutcome> = {};
        for (const secret of secrets) {
            outcomes[secret.name] = await this.upsertSecret(node, secret, options);
            this.logger.info({secret: `${secret.namespace}/${secret.name}`, outcome: outcomes[secret.name]}, "seeded cluster secret");
        }
        return outcomes;
    }

    private async upsertSecret(node: NodeSpec, secret: ClusterSecret, options?: ExecOptions): Promise<SecretOutcome> {
        const wanted = encode(secret.data);
        const existing = await this.readSecret(node, secret, options);

        if (existing === undefined) {
            const manifest = stringify({
                apiVersion: "v1",
                kind: "Secret",
                metadata: {name: secret.name, namespace: secret.namespace},
                type: "Opaque",
                data: wanted,
            });
            await this.withStagedFile(node, `${secret.name}.yaml`, manifest, path =>
                run(this.executor, node, [Commands.createFromFile(path)], "CommandFailure", options), options);
            return "created";
        }

        if (sameData(existing, wanted)) return "unchanged";

        if (!this.options.overwriteSecrets) {
            throw new BootstrapError("SecretConflict",
                `secret ${secret.namespace}/${secret.name} already exists with different content`);
        }
        await this.withStagedFile(node, `${secret.name}.patch.json`, JSON.stringify({data: wanted}), path =>
            run(this.executor, node, [Commands.patchSecret(secret.namespace, secret.name, path)], "CommandFailure", options), options);
        return "patched";
    }

    private async readSecret(node: NodeSpec, secret: ClusterSecret, options?: ExecOptions): Promise<Record<string, string> | undefined> {
        const result = await run(this.executor, node, [Commands.getSecretData(secret.namespace, secret.name)], "CommandFailure", options);
        const output = result.stdout.trim();
        if (output === "") return undefined;

        let parsed: unknown;
        try {
            parsed = JSON.parse(output);
        } catch (err) {
            throw new BootstrapError("CommandFailure", `unreadable data for secret ${secret.namespace}/${secret.name}`, {cause: err});
        }
        const data = secretDataSchema.safeParse(parsed);
        if (!data.success) {
            throw new BootstrapError("CommandFailure", `unexpected data for secret ${secret.namespace}/${secret.name}`, {cause: data.error});
        }
        return data.data;
    }

    // Secret material only lives on disk for the duration of the kubectl call.
    private async withStagedFile<T>(node: NodeSpec, name: string, content: string, use: (path: string) => Promise<T>, options?: ExecOptions): Promise<T> {
        const path = `${Paths.secrets}/${name}`;
        await run(this.executor, node, [Commands.makeDir(Paths.secrets)], "CommandFailure", options);
        await this.executor.upload(node, content, path, options);
        try {
            return await use(path);
        } finally {
            await this.removeStaged(node, path, options);
        }
    }

    // A failed cleanup is logged; it never replaces the outcome of the kubectl call.
    private async removeStaged(node: NodeSpec, path: string, options?: ExecOptions): Promise<void> {
        try {
            const result = await this.executor.execute(node, [Commands.removeFile(path)], options);
            if (result.code !== 0) {
                this.logger.warn({path, code: result.code}, `could not remove staged file on ${node.name}: ${result.stderr.trim()}`);
            }
        } catch (err) {
            const error = toBootstrapError(err, "CommandFailure");
            this.logger.warn({path, kind: error.kind}, `could not remove staged file on ${node.name}: ${error.message}`);
        }
    }

    async apply(node: NodeSpec, bundle: ManifestFiles, options?: ExecOptions): Promise<ApplyOutcome> {
        const hash = getFilesHash(bundle);
        try {
            const marker = await run(this.executor, node, [Commands.readFile(Paths.appliedMarker)], "CommandFailure", options);
            if (marker.stdout.trim() === hash) {
                this.logger.info({hash}, "add-on bundle already applied");
                return "unchanged";
            }

            await run(this.executor, node, [Commands.makeDir(Paths.postInstall)], "CommandFailure", options);
            for (const name of Object.keys(bundle).sort()) {
                await this.executor.upload(node, bundle[name], `${Paths.postInstall}/${name}`, options);
            }
            await run(this.executor, node, [Commands.applyKustomization(Paths.postInstall)], "AddonApplyFailure", options);
            await this.executor.upload(node, `${hash}\n`, Paths.appliedMarker, options);
        } catch (err) {
            const error = toBootstrapError(err, "AddonApplyFailure");
            if (error.kind === "Cancelled" || error.kind === "AddonApplyFailure") throw error;
            throw new BootstrapError("AddonApplyFailure", `applying the add-on bundle failed: ${error.message}`, {cause: error});
        }

        this.logger.info({hash, files: Object.keys(bundle).length}, "applied add-on bundle");
        return "applied";
    }
}
