// Copyright 2016-2019, Pulumi Corporation.  All rights reserved.

import * as pulumi from "@pulumi/pulumi";
import {randomUUID} from "crypto";
import {isDeepStrictEqual} from "util";

export interface ProvisionerProperties<T, U> {
    // dep holds the inputs the provisioner runs with; a change to them re-runs it.
    dep: pulumi.Input<T>;
    changeToken?: pulumi.Input<string>;
    onCreate: (dep: pulumi.Unwrap<T>) => Promise<U>;
}

interface ProvisionerOutputs<T, U> {
    dep: pulumi.Unwrap<T>;
    changeToken?: string;
    result: U;
}

// Provisioner is a dynamic resource that runs `onCreate` when it is created,
// and again (through a replacement) whenever its inputs or change token change.
export class Provisioner<T, U> extends pulumi.dynamic.Resource {
    public readonly dep!: pulumi.Output<T>;
    public readonly result!: pulumi.Output<U>;

    constructor(name: string, props: ProvisionerProperties<T, U>, opts?: pulumi.CustomResourceOptions) {
        const provider: pulumi.dynamic.ResourceProvider = {
            diff: async (_id: pulumi.ID, olds: ProvisionerOutputs<T, U>, news: ProvisionerOutputs<T, U>) => {
                const replaces: string[] = [];
                if (!isDeepStrictEqual(olds.dep, news.dep)) replaces.push("dep");
                if (olds.changeToken !== news.changeToken) replaces.push("changeToken");
                return {changes: replaces.length > 0, replaces, deleteBeforeReplace: true};
            },
            create: async (inputs: ProvisionerOutputs<T, U>) => {
                const result = await props.onCreate(inputs.dep);
                return {id: randomUUID(), outs: {dep: inputs.dep, changeToken: inputs.changeToken, result}};
            },
        };
        super(provider, name, {dep: props.dep, changeToken: props.changeToken, result: undefined}, opts);
    }
}
