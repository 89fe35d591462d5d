// Copyright 2016-2020, Pulumi Corporation.  All rights reserved.

import * as crypto from "crypto";
import * as pulumi from "@pulumi/pulumi";

export function getStringHash(data: string): string {
    return crypto.createHash("md5").update(data, "utf8").digest("hex");
}

// Hashes a set of named files independently of the order they were produced in.
export function getFilesHash(files: Readonly<Record<string, string>>): string {
    const names = Object.keys(files).sort();
    return getStringHash(names.map(name => `${name}\0${files[name]}`).join("\0"));
}

export function getOutputStringHash(data: pulumi.Output<string>): pulumi.Output<string> {
    return data.apply(x => getStringHash(x));
}
