import * as pulumi from "@pulumi/pulumi";
import {HcloudK3sCluster} from "./hcloud";
import {getCredentials} from "./hcloud/credentials";

const config = new pulumi.Config();
const clusterSettings = config.requireObject<unknown>("cluster");
const nodes = config.requireObject<unknown>("nodes");

const cluster = new HcloudK3sCluster(clusterSettings, nodes, getCredentials(config), pulumi.getStack(), config.getSecret("clusterToken"));

export const result = cluster.result;
