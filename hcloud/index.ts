import * as hcloud from "@pulumi/hcloud";
import * as pulumi from "@pulumi/pulumi";
import {BootstrapInputs} from "../bootstrap";
import {BootstrapReport} from "../bootstrap/report";
import {ClusterBootstrap} from "../provisioner";
import {Credentials} from "./credentials";
import {getOutputStringHash} from "./hash";
import {ClusterSettings, NodeSpec, parseClusterSettings, parseNodes} from "./settings";

export class HcloudK3sCluster {
    private readonly settings: ClusterSettings;
    private readonly nodes: NodeSpec[];

    result: {report: pulumi.Output<BootstrapReport>};

    constructor(rawSettings: unknown, rawNodes: unknown, credentials: Credentials, prefix: string, clusterToken?: pulumi.Output<string>) {
        // Validated here as well so that a bad stack config fails the preview, not the deployment.
        this.settings = parseClusterSettings(rawSettings);
        this.nodes = parseNodes(rawNodes);

        const token = hcloud.config.token;
        if (!token) {
            throw new Error("hcloud:token must be set: the cloud controller and the CSI driver need it");
        }

        const inputs = pulumi.all([
            credentials.privateKey,
            credentials.privateKeyPassphrase,
            clusterToken,
            pulumi.secret(token),
        ]).apply(([privateKey, privateKeyPassphrase, clusterTokenValue, hcloudToken]): BootstrapInputs => ({
            settings: this.settings,
            nodes: this.nodes,
            username: credentials.username,
            privateKey,
            privateKeyPassphrase,
            clusterToken: clusterTokenValue,
            hcloudToken,
        }));

        const changeToken = getOutputStringHash(pulumi.output(JSON.stringify({settings: this.settings, nodes: this.nodes})));

        const bootstrap = new ClusterBootstrap(`${prefix}-${this.settings.name}-bootstrap`, {inputs, changeToken});

        this.result = {
            report: bootstrap.report
        };
    }
}
