import {Config, Output} from "@pulumi/pulumi";

export interface Credentials {
    privateKey: Output<string>,
    privateKeyPassphrase: Output<string> | undefined,
    username: string
}

// Keys may be stored PEM/OpenSSH-armored or base64-encoded as a whole.
export function decodePrivateKey(key: string): string {
    if (key.startsWith("-----BEGIN ")) {
        return key;
    }
    return Buffer.from(key, "base64").toString("ascii");
}

export function getCredentials(config: Config): Credentials {
    return {
        privateKey: config.requireSecret("privateKey").apply(decodePrivateKey),
        privateKeyPassphrase: config.getSecret("privateKeyPassphrase"),
        username: config.get("username") ?? "root"
    };
}
