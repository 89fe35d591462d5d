import pino, {Logger} from "pino";
import {ClusterSettings} from "../hcloud/settings";

export function createLogger(level: ClusterSettings["logLevel"]): Logger {
    return pino({
        name: "hcloud-k3s-bootstrap",
        level,
        redact: {paths: ["token", "*.token", "hcloudToken", "privateKey"], censor: "[redacted]"},
    });
}
