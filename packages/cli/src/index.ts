import "dotenv/config";
import { readFileSync } from "node:fs";
import { Command } from "commander";
import pc from "picocolors";
import { previewCommand } from "./commands/preview.js";
import { schemaCommand } from "./commands/schema.js";
import { statusCommand } from "./commands/status.js";

// Graceful shutdown
process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
const cliVersion =
	typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
		? pkg.version
		: "0.0.0";

const BANNER = `
  ${pc.bold(pc.cyan("pgwarden"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Allow-listed, parameterized PostgreSQL access")}
`;

const program = new Command()
	.name("pgwarden")
	.description("Check the pool, inspect the allow-list and preview statements")
	.version(cliVersion, "-v, --version")
	.option("--cwd <dir>", "Working directory", process.cwd())
	.option("-c, --config <path>", "Path to pgwarden config file")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(statusCommand);
program.addCommand(schemaCommand);
program.addCommand(previewCommand);

function sanitizeErrorMessage(message: string): string {
	return message
		.replace(/postgres(ql)?:\/\/[^\s]+/gi, "postgres://***")
		.replace(/(password|token|secret|key)[=:]\s*\S+/gi, "$1=***");
}

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "commander.helpDisplayed") {
		process.exit(0);
	}
	if (error instanceof Error && "code" in error && error.code === "commander.version") {
		process.exit(0);
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(sanitizeErrorMessage(message)));
	process.exit(1);
}
