import * as p from "@clack/prompts";
import { DEFAULT_LIMITS, LIMIT_KEYS, resolveLimits, TableAllowList } from "@pgwarden/core";
import { Command } from "commander";
import pc from "picocolors";
import { getConfig } from "../utils/get-config.js";

export const schemaCommand = new Command("schema")
	.description("Show the allow-listed tables, their ORDER BY columns and the active limits")
	.action(async () => {
		const parent = schemaCommand.parent;
		const cwd: string = parent?.opts().cwd ?? process.cwd();
		const configFlag: string | undefined = parent?.opts().config;

		p.intro(pc.bgCyan(pc.black(" pgwarden schema ")));

		const { config, configFile } = await getConfig({ cwd, configPath: configFlag });
		if (configFile) {
			p.log.success(`  Config file:   ${pc.green("found")} ${pc.dim(configFile)}`);
		} else {
			p.log.info(`  Config file:   ${pc.dim("none, using the built-in allow-list")}`);
		}

		const schema = new TableAllowList(config.schema);

		p.log.step(pc.bold("Tables"));
		for (const table of schema.tables()) {
			const orderBy = [...schema.orderByColumns(table)];
			const columns = schema.columns(table);
			p.log.info(
				`  ${pc.cyan(table.padEnd(16))} order by: ${orderBy.length > 0 ? orderBy.join(", ") : pc.dim("none")}`,
			);
			if (columns) {
				p.log.message(`  ${" ".repeat(16)} columns:  ${pc.dim([...columns].join(", "))}`);
			}
		}

		const limits = resolveLimits(config.limits);
		p.log.step(pc.bold("Limits"));
		for (const key of LIMIT_KEYS) {
			const value = String(limits[key]);
			p.log.info(`  ${key.padEnd(14)} ${limits[key] !== DEFAULT_LIMITS[key] ? pc.yellow(value) : value}`);
		}

		p.outro(pc.dim(`${schema.tables().length} table(s) allow-listed.`));
	});
