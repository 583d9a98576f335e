/**
 * SignalRadar — Validate Config Script
 *
 * Checks a config file without running anything.
 *
 * Usage:
 *   npm run validate-config                # config/radar.config.json
 *   npm run validate-config -- <path>
 */

import { loadConfig } from '../src/config';
import { ConfigurationError } from '../src/lib/errors';

function main(): void {
  const path = process.argv.slice(2).find(arg => !arg.startsWith('--'));

  try {
    const config = loadConfig(path);
    const enabled = config.sources.filter(s => s.enabled);

    console.log('Configuration is valid');
    console.log(`  Sources:  ${enabled.length} enabled of ${config.sources.length}`);
    for (const source of config.sources) {
      console.log(`    ${source.enabled ? '+' : '-'} ${source.name} (${source.kind})`);
    }
    console.log(`  Keywords: ${config.domain.keywords.length} include, ${config.domain.excludeKeywords.length} exclude`);
    console.log(`  Topics:   ${Object.keys(config.topics).join(', ') || '(none)'}`);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

main();
