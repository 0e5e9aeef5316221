#!/usr/bin/env tsx

import * as fs from 'node:fs';
import { LogAnalyzer } from '../src/utils/logAnalyzer.js';

interface CliOptions {
  logFile?: string;
  output: 'text' | 'json';
  save?: string;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = {
    output: 'text'
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--log-file':
      case '-f':
        options.logFile = next;
        i++;
        break;
      case '--output':
      case '-o':
        if (next === 'text' || next === 'json') {
          options.output = next;
        }
        i++;
        break;
      case '--save':
      case '-s':
        options.save = next;
        i++;
        break;
      case '--help':
      case '-h':
        showHelp();
        process.exit(0);
    }
  }

  return options;
}

function showHelp() {
  console.log(`
acp-debounce Log Analyzer

Usage: tsx scripts/analyze-logs.ts [options]

Options:
  -f, --log-file <path>     Path to log file (default: ~/.acp-debounce/logs/acp-debounce.log)
  -o, --output <format>     Output format: text, json (default: text)
  -s, --save <path>         Save output to file
  -h, --help                Show this help

The log must have been written with LOG_LEVEL=debug (or higher) for chunk
counts to be present; flush counts need LOG_LEVEL=info.
`);
}

function main() {
  const options = parseArgs();

  try {
    const analyzer = new LogAnalyzer(options.logFile);
    console.log(`📊 Analyzing log file: ${analyzer.getLogFile()}`);

    const report = analyzer.analyze();
    const output = options.output === 'json'
      ? JSON.stringify(report, null, 2)
      : LogAnalyzer.formatReport(report);

    if (options.save) {
      fs.writeFileSync(options.save, output, 'utf-8');
      console.log(`💾 Output saved to: ${options.save}`);
    } else {
      console.log('\n📋 Output:');
      console.log(output);
    }
  } catch (error) {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main();
