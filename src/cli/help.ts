/**
 * @fileoverview Detailed help text for tactician CLI commands
 */

const HELP_TEXT = {
  main: `
Tactician - DDD tactical pattern compliance checker

USAGE:
    tactician <command> [options]

COMMANDS:
    analyze             Check the workspace against the rule catalog
    scan                Print the type descriptors found in the workspace
    rules               List the rule catalog
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -w, --workspace     Set workspace directory (default: current directory)
    --verbose           Enable debug logging on stderr
    --json              Print errors as JSON envelopes

EXIT CODES:
    0   Success
    1   Action items at or above the --fail-on severity
    2   Invalid arguments
    3   Configuration, descriptor or scan error
    4   Rule catalog failed to load
    70  Unexpected error

EXAMPLES:
    tactician analyze
    tactician analyze --format markdown --output ddd-report.md
    tactician scan --output types.json
    tactician analyze --descriptors types.json --fail-on critical
    tactician rules --category aggregate

For more information on a specific command, run:
    tactician help <command>
`,

  analyze: `
tactician analyze - Check the workspace against the rule catalog

USAGE:
    tactician analyze [options]

OPTIONS:
    --descriptors <file>  Read type descriptors from a JSON file instead of scanning
    --config <file>       Use this config file instead of tactician.config.yaml
    --format <format>     text (default), markdown or json
    -o, --output <file>   Write the report to a file instead of stdout
    --fail-on <severity>  critical, high, medium, low or none (default: config failOn, high)

DESCRIPTION:
    Every class and interface matched by the include patterns is classified
    as an entity, value object, aggregate, repository, domain service or
    domain event, and checked against the rules of that category. Types that
    fit no category are listed as coverage gaps.

    Action items are ordered by severity, then rule, then source position.
    Rules marked (heuristic) judge names or conventions and may be wrong.

EXAMPLES:
    tactician analyze
    tactician analyze --format json --output report.json
    tactician analyze --fail-on none
`,

  scan: `
tactician scan - Print the type descriptors found in the workspace

USAGE:
    tactician scan [options]

OPTIONS:
    --config <file>       Use this config file instead of tactician.config.yaml
    -o, --output <file>   Write descriptors to a file instead of stdout

DESCRIPTION:
    Outputs the structural descriptors the analyzer evaluates, as JSON. Edit
    them (for example to add categoryHint or identity flags) and feed them
    back with 'tactician analyze --descriptors <file>'.

EXAMPLES:
    tactician scan --output types.json
`,

  rules: `
tactician rules - List the rule catalog

USAGE:
    tactician rules [options]

OPTIONS:
    --category <category>  entity, value-object, aggregate, repository,
                           domain-service, domain-event or naming
    --format <format>      text (default) or json
    --config <file>        Apply rules.disable and rules.severity from this file

EXAMPLES:
    tactician rules
    tactician rules --category value-object --format json
`,
};

type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return value in HELP_TEXT;
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
