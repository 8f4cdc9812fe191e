#!/usr/bin/env node
import { createProgram, describeError } from "./program";

createProgram().parseAsync().catch((error: unknown) => {
	console.error(describeError(error));
	process.exitCode = 1;
});
