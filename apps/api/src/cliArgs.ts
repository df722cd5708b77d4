import { ValidationError } from './errors';

export const COMMANDS = ['convert', 'analyze', 'query', 'parameters', 'summary', 'help'] as const;
export type Command = (typeof COMMANDS)[number];

const isCommand = (value: string): value is Command => COMMANDS.some(c => c === value);

export type CliArgs = {
  command: Command;
  /** Positional words after the command. */
  positionals: string[];
  /** `--name=value` and `--name value` options; bare flags map to true. */
  options: Record<string, string | true>;
};

const BOOLEAN_FLAGS = new Set(['replace', 'reuse', 'synthesize', 'help']);

export const parseCliArgs = (argv: string[]): CliArgs => {
  const [first, ...rest] = argv;
  const name = first ?? 'help';
  if (!isCommand(name)) {
    throw new ValidationError(`Unknown command '${name}'. Run 'help' for usage.`, { operation: 'cli' });
  }

  const positionals: string[] = [];
  const options: Record<string, string | true> = {};
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      options[body.slice(0, eq)] = body.slice(eq + 1);
    } else if (BOOLEAN_FLAGS.has(body) || i + 1 >= rest.length || rest[i + 1].startsWith('--')) {
      options[body] = true;
    } else {
      options[body] = rest[++i];
    }
  }

  return { command: name, positionals, options };
};

export const stringOption = (args: CliArgs, name: string): string | undefined => {
  const value = args.options[name];
  if (value === true) throw new ValidationError(`--${name} needs a value`, { operation: 'cli' });
  return value;
};

export const flag = (args: CliArgs, name: string) => args.options[name] !== undefined;

export const USAGE = `Usage: bim-insight <command> [options]

Commands:
  convert     Load element exports into the vector collection
                --data-folder=DIR   folder with *_<type>_*.csv|xlsx exports
                --replace | --reuse what to do when the collection exists
  analyze     Profile the exports, compare against an expected schema, write the HTML report
                --data-folder=DIR   --schema=FILE   --output=FILE
                --synthesize        derive the expected schema from the data
                --save-schema=FILE  write the synthesized schema
  query       Ask a question (interactive when no question is given)
  parameters  List missing parameters for wall, door, window or slab
  summary     Summarize missing parameters per element type
`;
