#!/usr/bin/env node
import { main } from '@/precis';
import { errorMessage } from '@/errors';

main().catch((error: unknown) => {
    process.stderr.write(`Error: ${errorMessage(error)}\n`);
    process.exit(1);
});
