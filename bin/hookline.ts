#!/usr/bin/env node

import { createCLI } from '../src/cli/index.js';
import { CliSession } from '../src/cli/session.js';
import { renderError } from '../src/cli/ui/render.js';
import { errorMessage } from '../src/errors.js';

const session = new CliSession();
const program = createCLI(session);

async function main(): Promise<void> {
    try {
        await program.parseAsync(process.argv);
    } finally {
        // notify hooks still running when the command finished
        await session.close();
    }
}

main().catch((err: unknown) => {
    renderError(errorMessage(err));
    process.exit(1);
});
