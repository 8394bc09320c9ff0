#!/usr/bin/env node
import { run } from "./app";
import { installStopHandlers } from "./stop-signals";

const controller = new AbortController();

installStopHandlers(controller, {
	on: (signal, listener) => process.on(signal, listener),
	exit: code => process.exit(code),
	stderr: process.stderr
});

run(process.argv, {
	stdout: process.stdout,
	stderr: process.stderr,
	signal: controller.signal
})
	.then(code => process.exit(code))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
