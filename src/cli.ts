import { processDirectory } from './batch';
import { ConfigurationError } from './errors';
import { resolveConfig, USAGE } from './services/config';

/** Runs one batch; resolves to the process exit code. */
export async function main(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<number> {
  try {
    const config = resolveConfig(argv, env);
    if (config.help) {
      console.log(USAGE);
      return 0;
    }

    const summary = await processDirectory(config);
    console.log(
      `[pdf-outline] done: ${summary.written.length} written, ${summary.failed.length} skipped of ${summary.processed}`
    );
    return 0;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error(`[pdf-outline] Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
