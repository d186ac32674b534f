#!/usr/bin/env node
//
//
//

import * as dotenv from "dotenv";
import { run } from "./cli";
import { removeTemporaries } from "./utils";

function interrupt(signal: NodeJS.Signals): void {
    removeTemporaries();
    process.exit(signal === "SIGINT" ? 130 : 143);
}

async function main(): Promise<number> {
    dotenv.config();
    process.once("SIGINT", interrupt);
    process.once("SIGTERM", interrupt);

    return run(process.argv.slice(2), process.env);
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err) => {
        // eslint-disable-next-line no-console
        console.error(err);
        process.exitCode = 1;
    });
