// Main entry point for the thrustbench command line
import { loadAppConfig } from './core/AppConfig.js';
import { isThrustbenchError } from './core/errors.js';
import { Logger } from './core/Logger.js';
import { parseArgs, runCli, USAGE } from './ui/CommandLine.js';
import { Prompter, createTerminalReader } from './ui/Prompter.js';

const write = (line: string): void => {
  process.stdout.write(line + '\n');
};

async function main(argv: readonly string[]): Promise<number> {
  const logger = new Logger('info');

  try {
    const args = parseArgs(argv);
    if (args.help) {
      write(USAGE);
      return 0;
    }

    const config = loadAppConfig({ path: args.config });
    logger.setLevel(args.verbose ? 'debug' : config.logging.level);

    write('Welcome to thrustbench - rocket engine performance calculator');
    const prompter = new Prompter(createTerminalReader(), write);
    try {
      await runCli(args, config, prompter, { write, logger, precision: config.output.precision });
    } finally {
      prompter.close();
    }
    return 0;
  } catch (error) {
    if (isThrustbenchError(error)) {
      logger.error(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Unexpected failure:', error);
    process.exitCode = 1;
  }
);
