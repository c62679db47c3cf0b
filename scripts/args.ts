import { parseIsoDate } from "../src/calendar/fiscal";

export interface CliArgs {
  expensesPath: string;
  inflowsPath: string;
  today: Date;
  project?: string;
}

const USAGE = "Usage: summarize <expenses.csv> <inflows.csv> [--today YYYY-MM-DD] [--project NAME]";

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let today = new Date();
  let project: string | undefined;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--today" || arg === "--project") {
      const value = argv[index + 1];
      if (!value) {
        throw new Error(`Missing value for ${arg}. ${USAGE}`);
      }
      index += 1;
      if (arg === "--project") {
        project = value;
        continue;
      }
      const date = parseIsoDate(value);
      if (!date) {
        throw new Error(`Invalid --today value "${value}". ${USAGE}`);
      }
      today = date;
      continue;
    }
    positional.push(arg);
  }

  const [expensesPath, inflowsPath] = positional;
  if (!expensesPath || !inflowsPath) {
    throw new Error(USAGE);
  }
  return { expensesPath, inflowsPath, today, project };
}
