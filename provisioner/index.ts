// Copyright 2016-2019, Pulumi Corporation.  All rights reserved.

import * as pulumi from "@pulumi/pulumi";

import {BootstrapInputs, runBootstrap} from "../bootstrap";
import {BootstrapReport} from "../bootstrap/report";
import {Provisioner} from "./provisioner";

export interface ClusterBootstrapArgs {
    // Settings, nodes and secrets the bootstrap runs with; see hcloud/index.ts.
    inputs: pulumi.Input<BootstrapInputs>;
    // changeToken allows you to specify a value that controls the replacement of the bootstrap resource.
    changeToken?: pulumi.Input<string>;
}

// ClusterBootstrap runs the bootstrap orchestrator as part of a Pulumi deployment.
export class ClusterBootstrap extends pulumi.ComponentResource {
    private readonly provisioner: Provisioner<BootstrapInputs, BootstrapReport>;
    // The node → phase → error report of the run that created the resource.
    public readonly report: pulumi.Output<BootstrapReport>;

    constructor(name: string, args: ClusterBootstrapArgs, opts?: pulumi.ComponentResourceOptions) {
        super("hcloud-k3s:bootstrap:ClusterBootstrap", name, {}, opts);

        this.provisioner = new Provisioner<BootstrapInputs, BootstrapReport>(
            `${name}-provisioner`,
            {
                dep: args.inputs,
                changeToken: args.changeToken,
                onCreate: (inputs) => runBootstrap(inputs),
            },
            {parent: this},
        );

        this.report = this.provisioner.result;
        this.registerOutputs({report: this.report});
    }
}
