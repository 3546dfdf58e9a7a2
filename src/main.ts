#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import { queryCommand } from "./cli/query.js";
import { errorMessage } from "./errors.js";
import { VERSION } from "./index.js";

const program = new Command();

program
	.name("tunebase")
	.description("Query and update a file-backed music library with JSON requests")
	.version(VERSION)
	.option("-l, --library <path>", "Options file or library directory (default: nearest tunebase.yml)");

program
	.command("query")
	.alias("q")
	.description("Run a JSON request and print the response")
	.argument("<request>", "JSON text, @file to read it from a file, or - for stdin")
	.action((request: string) => {
		queryCommand(request, program.opts<{ library?: string }>()).catch((e) => {
			console.error(pc.red("Error:"), errorMessage(e));
			process.exit(1);
		});
	});

program
	.command("version")
	.description("Print the version")
	.action(() => {
		console.log(VERSION);
	});

program.parse();
