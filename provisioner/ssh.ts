// Copyright 2016-2019, Pulumi Corporation.  All rights reserved.

import {Logger} from "pino";
import * as ssh2 from "ssh2";
import {setTimeout as sleep} from "timers/promises";

import {BootstrapError} from "../bootstrap/errors";
import {ExecOptions, RemoteExecutor, RunCommandResult} from "../bootstrap/executor";
import {NodeSpec} from "../hcloud/settings";

// ConnectionArgs tells the executor how to reach a node over SSH.
export interface ConnectionArgs {
    host: string;
    port?: number;
    username?: string;
    password?: string;
    privateKey?: string;
    privateKeyPassphrase?: string;
}

function connToSsh2(conn: ConnectionArgs): ssh2.ConnectConfig {
    return {
        host: conn.host,
        port: conn.port,
        username: conn.username,
        password: conn.password,
        privateKey: conn.privateKey,
        passphrase: conn.privateKeyPassphrase,
        readyTimeout: 10_000,
    };
}

export interface SshExecutorOptions {
    username: string;
    privateKey: string;
    privateKeyPassphrase?: string;
    // Connection attempts before a ConnectionError is raised.
    connectAttempts?: number;
    // Base delay between connection attempts; the n-th retry waits n times as long.
    retryDelay?: number;
    logger: Logger;
}

// The authorized_keys line of the key the executor logs in with.
export function publicKeyOf(privateKey: string, passphrase?: string): string {
    const parsed = ssh2.utils.parseKey(privateKey, passphrase);
    if (parsed instanceof Error) {
        throw new BootstrapError("InvalidSettings", `cannot read the SSH private key: ${parsed.message}`, {cause: parsed});
    }
    return `${parsed.type} ${parsed.getPublicSSH().toString("base64")}`;
}

function cancelled(node: NodeSpec): BootstrapError {
    return new BootstrapError("Cancelled", `cancelled while talking to ${node.name}`);
}

// SshExecutor runs commands over ssh2 exec channels and writes files over SFTP.
export class SshExecutor implements RemoteExecutor {
    private readonly connectAttempts: number;
    private readonly retryDelay: number;

    constructor(private readonly options: SshExecutorOptions) {
        this.connectAttempts = options.connectAttempts ?? 3;
        this.retryDelay = options.retryDelay ?? 5_000;
    }

    connection(node: NodeSpec): ConnectionArgs {
        return {
            host: node.host,
            port: node.port,
            username: this.options.username,
            privateKey: this.options.privateKey,
            privateKeyPassphrase: this.options.privateKeyPassphrase,
        };
    }

    async execute(node: NodeSpec, commands: string[], options?: ExecOptions): Promise<RunCommandResult> {
        const client = await this.connect(node, options?.signal);
        try {
            let stdout = "";
            let stderr = "";
            for (const cmd of commands) {
                this.options.logger.debug({node: node.name, cmd}, "running remote command");
                const result = await this.runCommand(node, client, cmd, options?.signal);
                stdout += result.stdout;
                stderr += result.stderr;
                if (result.code !== 0) return {stdout, stderr, code: result.code};
            }
            return {stdout, stderr, code: 0};
        } finally {
            client.end();
        }
    }

    async upload(node: NodeSpec, content: string, destination: string, options?: ExecOptions): Promise<void> {
        const client = await this.connect(node, options?.signal);
        try {
            await new Promise<void>((resolve, reject) => {
                const onAbort = () => reject(cancelled(node));
                options?.signal?.addEventListener("abort", onAbort, {once: true});
                client.sftp((err, sftp) => {
                    if (err) {
                        options?.signal?.removeEventListener("abort", onAbort);
                        reject(new BootstrapError("ConnectionError", `sftp on ${node.name} failed: ${err.message}`, {cause: err}));
                        return;
                    }
                    sftp.writeFile(destination, content, {mode: 0o600}, (writeErr) => {
                        options?.signal?.removeEventListener("abort", onAbort);
                        sftp.end();
                        if (writeErr) {
                            reject(new BootstrapError("CommandFailure", `writing ${destination} on ${node.name} failed: ${writeErr.message}`, {cause: writeErr}));
                        } else {
                            resolve();
                        }
                    });
                });
            });
        } finally {
            client.end();
        }
    }

    private async connect(node: NodeSpec, signal?: AbortSignal): Promise<ssh2.Client> {
        const config = connToSsh2(this.connection(node));
        let connectionFailCount = 0;
        while (true) {
            if (signal?.aborted) throw cancelled(node);
            try {
                return await this.connectOnce(config, signal);
            } catch (err) {
                if (signal?.aborted) throw cancelled(node);
                connectionFailCount++;
                const message = err instanceof Error ? err.message : String(err);
                if (connectionFailCount >= this.connectAttempts) {
                    throw new BootstrapError("ConnectionError", `cannot reach ${node.name} at ${node.host}: ${message}`, {cause: err});
                }
                this.options.logger.debug({node: node.name, attempt: connectionFailCount}, `ssh connect failed: ${message}`);
                try {
                    await sleep(connectionFailCount * this.retryDelay, undefined, {signal});
                } catch (sleepErr) {
                    throw new BootstrapError("Cancelled", `cancelled while talking to ${node.name}`, {cause: sleepErr});
                }
            }
        }
    }

    private connectOnce(config: ssh2.ConnectConfig, signal?: AbortSignal): Promise<ssh2.Client> {
        return new Promise((resolve, reject) => {
            const conn = new ssh2.Client();
            const onAbort = () => {
                conn.end();
                reject(new Error("aborted"));
            };
            signal?.addEventListener("abort", onAbort, {once: true});
            conn.once("ready", () => {
                signal?.removeEventListener("abort", onAbort);
                // Hosts going down for a reboot reset the connection after the last command.
                conn.on("error", (err) => this.options.logger.debug({host: config.host}, `ssh connection error: ${err.message}`));
                resolve(conn);
            }).once("error", (err) => {
                signal?.removeEventListener("abort", onAbort);
                reject(err);
            }).connect(config);
        });
    }

    private runCommand(node: NodeSpec, conn: ssh2.Client, cmd: string, signal?: AbortSignal): Promise<RunCommandResult> {
        return new Promise((resolve, reject) => {
            const onAbort = () => {
                conn.end();
                reject(cancelled(node));
            };
            const onError = (err: Error) => {
                signal?.removeEventListener("abort", onAbort);
                reject(new BootstrapError("ConnectionError", `connection to ${node.name} lost: ${err.message}`, {cause: err}));
            };
            signal?.addEventListener("abort", onAbort, {once: true});
            conn.once("error", onError);

            conn.exec(cmd, (err, stream) => {
                if (err) {
                    signal?.removeEventListener("abort", onAbort);
                    conn.removeListener("error", onError);
                    reject(new BootstrapError("ConnectionError", `exec on ${node.name} failed: ${err.message}`, {cause: err}));
                    return;
                }
                let stdout = "";
                let stderr = "";
                let code = 255;
                stream.on("exit", (exitCode: number | null) => {
                    code = exitCode ?? 255;
                }).on("close", () => {
                    signal?.removeEventListener("abort", onAbort);
                    conn.removeListener("error", onError);
                    resolve({stdout, stderr, code});
                }).on("data", (data: Buffer) => {
                    const message = data.toString("utf8");
                    this.options.logger.trace({node: node.name}, message);
                    stdout += message;
                }).stderr.on("data", (data: Buffer) => {
                    const message = data.toString("utf8");
                    this.options.logger.trace({node: node.name, stream: "stderr"}, message);
                    stderr += message;
                });
            });
        });
    }
}
