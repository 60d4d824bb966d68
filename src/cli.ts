#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'node:util';
import { IMAGE_SIZES, loadConfig } from './config.js';
import { GalleryStore } from './gallery.js';
import { setLogLevel } from './logger.js';
import { InferenceClient } from './services/inference.js';
import { styleCatalog } from './styles.js';
import { Studio } from './studio.js';

const HELP = `
  Usage: imagecraft --prompt <text> [options]

  Options:
    -p, --prompt <text>     What to draw (required)
    -s, --style <name>      Style preset (default: ${styleCatalog.defaultStyle})
        --size <name|WxH>   Size preset, e.g. "square", "portrait", "768x512"
    -n, --count <n>         Number of variations (1-4)
        --steps <n>         Inference steps
        --guidance <n>      Guidance scale
        --seed <n>          Seed for reproducible output
        --negative <text>   Things to keep out of the image
        --list-styles       Show available styles and sizes
    -h, --help              Show help
`;

function toNumber(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (Number.isNaN(n)) {
    console.error(`❌ --${flag} must be a number, got "${value}"`);
    process.exit(1);
  }
  return n;
}

async function main() {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      prompt: { type: 'string', short: 'p' },
      style: { type: 'string', short: 's' },
      size: { type: 'string' },
      count: { type: 'string', short: 'n' },
      steps: { type: 'string' },
      guidance: { type: 'string' },
      seed: { type: 'string' },
      negative: { type: 'string' },
      'list-styles': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values['list-styles']) {
    console.log('\nStyles:');
    for (const preset of styleCatalog.list()) {
      console.log(`  ${preset.name.padEnd(16)} ${preset.description}`);
    }
    console.log('\nSizes:');
    for (const size of IMAGE_SIZES) {
      console.log(`  ${size.name}`);
    }
    return;
  }

  if (values.help || !values.prompt) {
    console.log(HELP);
    process.exit(0);
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  const studio = new Studio({
    config,
    client: new InferenceClient({ config }),
    gallery: new GalleryStore({ dir: config.galleryDir }),
  });

  const controller = new AbortController();
  process.on('SIGINT', () => controller.abort());

  console.log(`\n🎨 imagecraft`);
  console.log(`===================================================\n`);

  const events = studio.stream({
    prompt: values.prompt,
    style: values.style,
    size: values.size,
    variationCount: toNumber(values.count, 'count'),
    steps: toNumber(values.steps, 'steps'),
    guidanceScale: toNumber(values.guidance, 'guidance'),
    seed: toNumber(values.seed, 'seed'),
    negativePrompt: values.negative,
  }, { signal: controller.signal });

  let failed = false;
  for await (const event of events) {
    switch (event.type) {
      case 'generation:started':
        console.log(`→ ${event.request.variationCount} image(s), ${event.request.width}x${event.request.height}, style ${event.request.style}`);
        break;
      case 'generation:attempt':
        if (event.attempt.retryInMs !== undefined) {
          console.log(`  ⏳ model busy, retrying in ${Math.round(event.attempt.retryInMs / 1000)}s (attempt ${event.attempt.attempt})`);
        }
        break;
      case 'generation:saved':
        console.log(`✅ ${event.message}`);
        for (const entry of event.entries) {
          console.log(`  └─ ${entry.imagePath}`);
        }
        for (const failure of event.failures) {
          console.warn(`  ⚠️  image ${failure.variation + 1}: ${failure.message}`);
        }
        break;
      case 'generation:error':
        console.error(`❌ ${event.message}`);
        failed = true;
        break;
    }
  }

  if (failed) process.exit(1);
}

main().catch((err: unknown) => {
  console.error('\n❌ Fatal error:', err);
  process.exit(1);
});
