export type TuiMode = "auto" | "on" | "off";

export type CliOptions = {
  sampleRows?: number;
  columns: string[];
  json: boolean;
  schemaOnly: boolean;
  showSchema: boolean;
  tuiMode: TuiMode;
  sql?: string;
};

export type ParsedArgs = {
  input?: string;
  options: CliOptions;
  help: boolean;
  error?: string;
};

export const DEFAULT_PLAIN_ROWS = 20;

type ValueOption = "--sample-rows" | "--columns" | "--sql";

export function parseArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = {
    columns: [],
    json: false,
    schemaOnly: false,
    showSchema: true,
    tuiMode: "auto",
  };

  let input: string | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "--") {
      continue;
    }

    if (arg === "-h" || arg === "--help") {
      return { options, help: true };
    }

    if (arg === "--json") {
      options.json = true;
      options.tuiMode = "off";
      continue;
    }

    if (arg === "--tui") {
      options.tuiMode = "on";
      continue;
    }

    if (arg === "--plain" || arg === "--no-tui") {
      options.tuiMode = "off";
      continue;
    }

    if (arg === "--schema") {
      options.schemaOnly = true;
      options.tuiMode = "off";
      continue;
    }

    if (arg === "--no-schema") {
      options.showSchema = false;
      continue;
    }

    const sampleValue = readOptionValue(arg, "--sample-rows", argv[i + 1]);
    if (sampleValue) {
      const parsed = Number(sampleValue.value);
      if (!Number.isInteger(parsed) || parsed < 0) {
        return { options, help: false, error: `invalid --sample-rows value: ${sampleValue.value}` };
      }
      options.sampleRows = parsed;
      if (sampleValue.usedNext) {
        i += 1;
      }
      continue;
    }

    const columnsValue = readOptionValue(arg, "--columns", argv[i + 1]);
    if (columnsValue) {
      options.columns = columnsValue.value
        .split(",")
        .map((value) => value.trim())
        .filter(Boolean);
      if (columnsValue.usedNext) {
        i += 1;
      }
      continue;
    }

    const sqlValue = readOptionValue(arg, "--sql", argv[i + 1]);
    if (sqlValue) {
      options.sql = sqlValue.value;
      if (sqlValue.usedNext) {
        i += 1;
      }
      continue;
    }

    if (arg.startsWith("-")) {
      return { options, help: false, error: `unknown option: ${arg}` };
    }

    if (input) {
      return { options, help: false, error: `unexpected extra argument: ${arg}` };
    }

    input = arg;
  }

  return { input, options, help: false };
}

function readOptionValue(
  arg: string,
  name: ValueOption,
  next?: string,
): { value: string; usedNext: boolean } | null {
  if (arg === name) {
    if (!next || next.startsWith("-")) {
      return null;
    }
    return { value: next, usedNext: true };
  }

  if (arg.startsWith(`${name}=`)) {
    return { value: arg.slice(name.length + 1), usedNext: false };
  }

  return null;
}

/** The explorer opens unless output is machine-readable or not a terminal. */
export function shouldOpenTui(options: CliOptions, interactive: boolean): boolean {
  if (options.json || options.schemaOnly || options.sql !== undefined || options.tuiMode === "off") {
    return false;
  }
  return options.tuiMode === "on" || interactive;
}

export function usage(): string {
  return `parqscope <file|url> [options]

options:
  --sample-rows, --sample-rows=<n>  rows to load (default: 1000 in the explorer, ${DEFAULT_PLAIN_ROWS} in plain output)
  --columns, --columns=<c>          comma-separated column list
  --sql, --sql=<query>              run SQL query (use 'data' as table name)
  --schema                          print schema only
  --no-schema                       skip schema output
  --json                            output rows as json lines
  --tui                             open interactive explorer (default on a terminal)
  --plain, --no-tui                 disable interactive explorer
  -h, --help                        show help

examples:
  parqscope data.parquet
  parqscope data.parquet --columns=city,state --plain
  parqscope data.parquet --sql "SELECT city, COUNT(*) FROM data GROUP BY city"
  parqscope hf://datasets/acme/weather/daily.parquet
`;
}
