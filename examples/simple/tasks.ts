/**
 * Example tasks: download two datasets, then build a briefing and a plot
 * directory from them.
 */

import { writeFile } from "fs/promises";
import path from "path";

import { createLogger, type DataFileSet, type Task, type TaskContext, type TaskFactories } from "../../src/index.js";

const log = createLogger("example");

export class DownloadDataTask implements Task {
  readonly name = "download";
  readonly inputCodes = [];
  readonly outputCodes = [1230, 2110];

  async run(_inputs: DataFileSet, outputs: DataFileSet): Promise<void> {
    await outputs.csvOutput(1230).writeAll([
      { name: "Jane Doe", dob: new Date(Date.UTC(1980, 1, 3)), is_employee: true },
      { name: "Mark Smith", dob: new Date(Date.UTC(1970, 3, 5)), is_employee: false },
    ]);
    await outputs.csvOutput(2110).writeAll([
      { month: "2017-06", amount: 1 },
      { month: "2017-07", amount: 2 },
      { month: "2017-08", amount: 5 },
    ]);
  }
}

export class GenerateReportTask implements Task {
  readonly name = "report";
  readonly inputCodes = [1230, 2110];
  readonly outputCodes = [4315];

  async run(inputs: DataFileSet, outputs: DataFileSet, context: TaskContext): Promise<void> {
    const extended = Number(context["generate_report.extended_report"] ?? 0) !== 0;
    const people = await inputs.csvInput(1230).readAll();
    const employees = people.filter((person) => person["is_employee"] === true);

    const lines = [`${people.length} people in database, including ${employees.length} employees`];
    if (extended) {
      for (const input of inputs) {
        lines.push(`Used input file ${input.getPath()}`);
      }
    }
    await outputs.get(4315).writeText(lines.join("\n") + "\n");
  }
}

export class PlotBudgetTask implements Task {
  readonly name = "plot";
  readonly inputCodes = [2110];
  readonly outputCodes = [5214];

  async run(inputs: DataFileSet, outputs: DataFileSet): Promise<void> {
    const plots = outputs.get(5214);
    await plots.makeDirectory();

    const rows: string[] = [];
    for await (const record of inputs.csvInput(2110).records()) {
      const amount = typeof record["amount"] === "number" ? record["amount"] : 0;
      rows.push(`${String(record["month"])} ${"#".repeat(Math.round(amount))}`);
    }
    await writeFile(path.join(plots.getPath(), "budget.txt"), rows.join("\n") + "\n");
    log.info(`Plotted ${rows.length} months`);
  }
}

export const taskFactories: TaskFactories = {
  DownloadDataTask: () => new DownloadDataTask(),
  GenerateReportTask: () => new GenerateReportTask(),
  PlotBudgetTask: () => new PlotBudgetTask(),
};
