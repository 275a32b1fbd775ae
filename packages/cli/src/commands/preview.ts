import * as p from "@clack/prompts";
import { createQueryContext, isWardenError } from "@pgwarden/core";
import { Command } from "commander";
import pc from "picocolors";
import { getConfig } from "../utils/get-config.js";
import { buildPreview, describeParams, PREVIEW_OPERATIONS, type PreviewFlags } from "../utils/preview.js";

export const previewCommand = new Command("preview")
	.description(`Build a statement without running it (${PREVIEW_OPERATIONS.join(" | ")})`)
	.argument("<operation>", "select, insert, update, delete or count")
	.argument("<table>", "Allow-listed table name")
	.option("--where <json>", 'Filter, e.g. \'{"status":"paid","total":[">",100]}\'')
	.option("--data <json>", "Column values for insert and update")
	.option("--fields <list>", "Comma-separated columns to select")
	.option("--order-by <clause>", 'e.g. "created_at DESC"')
	.option("--limit <n>", "LIMIT for select")
	.option("--offset <n>", "OFFSET for select")
	.option("--or", "Join top-level filter conditions with OR")
	.option("--returning <column>", "RETURNING column for insert, update and delete")
	.action(async (operation: string, table: string, flags: PreviewFlags) => {
		const parent = previewCommand.parent;
		const cwd: string = parent?.opts().cwd ?? process.cwd();
		const configFlag: string | undefined = parent?.opts().config;

		p.intro(pc.bgCyan(pc.black(" pgwarden preview ")));

		const { config } = await getConfig({ cwd, configPath: configFlag });
		const ctx = createQueryContext({ schema: config.schema, limits: config.limits });

		try {
			const statement = buildPreview(ctx, operation, table, flags);
			p.log.step(pc.bold("SQL"));
			p.log.message(pc.cyan(statement.text));
			p.log.step(pc.bold(`Parameters (${statement.values.length})`));
			p.log.message(
				statement.values.length > 0 ? describeParams(statement.values).join("\n") : pc.dim("none"),
			);
			p.outro(pc.dim("Not executed."));
		} catch (error) {
			if (!isWardenError(error)) throw error;
			p.log.error(`${pc.red(error.code)} ${error.message}`);
			p.outro(pc.red("Statement rejected."));
			process.exitCode = 1;
		}
	});
