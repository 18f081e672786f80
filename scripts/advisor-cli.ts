#!/usr/bin/env tsx
/**
 * Advisor CLI - Interactive testing tool for the advisor core
 *
 * Usage:
 *   npm run cli
 *
 * Features:
 * - Fixture-backed financial data (fixtures/sample-profiles.json)
 * - Offline mode with keyword routing when no API key is configured
 * - Shows every supervisor decision and step update
 */

import { readFileSync } from 'fs';
import * as readline from 'readline';
import { fileURLToPath } from 'url';
import {
  FINANCIAL_TOOL_NAMES,
  FinancialAdvisor,
  OrchestrationError,
  createChatModel,
  createFixtureDataSource,
  createHeuristicClassifier,
  createLLMClassifier,
  createLLMSynthesizer,
  createSpecialistWorkers,
  createWorker,
  fallbackSummary,
  initLangSmith,
  loadAdvisorConfig,
  parseFixtureData,
  structuredResult,
  WORKER_IDS,
  type AdvisorCollaborators,
  type AdvisorStreamEvent,
  type FinalResult,
  type FinancialDataSource,
  type ResolvedAdvisorConfig,
  type RunContext,
  type Worker,
  type WorkerId,
} from '../packages/advisor-core/src';

// ============================================
// ANSI Colors for better CLI output
// ============================================
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  bgBlue: '\x1b[44m',
  bgGreen: '\x1b[42m',
};

function log(prefix: string, color: string, message: string, data?: unknown) {
  const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
  console.log(`${colors.dim}[${timestamp}]${colors.reset} ${color}${prefix}${colors.reset} ${message}`);
  if (data !== undefined) {
    console.log(colors.dim + JSON.stringify(data, null, 2) + colors.reset);
  }
}

function logStep(event: AdvisorStreamEvent) {
  const stepColors: Record<string, string> = {
    supervisor: colors.magenta,
    visualize: colors.cyan,
    consolidate: colors.green,
    finish: colors.yellow,
  };
  const color = stepColors[event.step] || colors.blue;
  const { delta } = event;

  if (event.step === 'supervisor') {
    log('[SUPERVISOR]', color, `turn ${delta.turnCount ?? '?'} -> ${delta.next ?? 'finish'}`);
    return;
  }

  log(`[${event.step.toUpperCase()}]`, color, 'Step complete');
  for (const message of delta.messages ?? []) {
    console.log(`  ${colors.dim}${message.role}${message.source ? `:${message.source}` : ''}${colors.reset} ${message.content}`);
  }
  for (const entry of delta.ledger ?? []) {
    console.log(`  ${colors.cyan}ledger${colors.reset} ${entry.toolName}`);
  }
}

function logResult(result: FinalResult) {
  console.log(`\n${colors.bgGreen}${colors.bright} ADVISOR RESULT ${colors.reset}`);
  console.log(colors.green + '─'.repeat(60) + colors.reset);
  console.log(result.summaryText);
  console.log(colors.green + '─'.repeat(60) + colors.reset);
  console.log(`  Turns: ${result.metadata.turnCount}`);
  console.log(`  Steps: ${result.metadata.stepsVisited.join(' -> ') || '(none)'}`);
  console.log(`  Ledger entries: ${result.metadata.ledgerSize}`);
  console.log(`  Charts: ${Object.keys(result.charts).join(', ') || '(none)'}`);
  if (result.metadata.guardrail.length > 0) {
    console.log(`  Guardrail: ${colors.yellow}${result.metadata.guardrail.join(', ')}${colors.reset}`);
  }
  if (result.metadata.partial) {
    console.log(`  ${colors.yellow}Partial result${colors.reset}`);
  }
  console.log('');
}

// ============================================
// Fixture Collaborators
// ============================================

function loadDataSource(): FinancialDataSource {
  const path = fileURLToPath(new URL('../fixtures/sample-profiles.json', import.meta.url));
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return createFixtureDataSource(parseFixtureData(raw));
}

type ToolCall = (source: FinancialDataSource, userId: string, context: RunContext) => Promise<unknown>;

const OFFLINE_TOOLS: Record<WorkerId, { toolName: string; call: ToolCall }> = {
  risk: {
    toolName: FINANCIAL_TOOL_NAMES.risk,
    call: (source, userId, context) => source.analyzeRiskProfile(userId, context),
  },
  fraud: {
    toolName: FINANCIAL_TOOL_NAMES.fraud,
    call: (source, userId, context) => source.detectFraud(userId, context),
  },
  projection: {
    toolName: FINANCIAL_TOOL_NAMES.projection,
    call: (source, userId, context) => source.projectPension(userId, context),
  },
};

/**
 * Workers that call their tool directly, with no model in between
 */
function createOfflineWorkers(dataSource: FinancialDataSource): Worker[] {
  return WORKER_IDS.map((id) =>
    createWorker(id, async (_queryText, context) => {
      if (!context.userId) {
        return `I need a user ID to run the ${id} analysis.`;
      }
      const { toolName, call } = OFFLINE_TOOLS[id];
      const observation = await call(dataSource, context.userId, context);
      return structuredResult(JSON.stringify(observation), [
        { toolName, input: { user_id: context.userId }, observation: JSON.stringify(observation) },
      ]);
    })
  );
}

function createCollaborators(config: ResolvedAdvisorConfig, dataSource: FinancialDataSource): AdvisorCollaborators {
  if (!config.apiKey) {
    log('[CLI]', colors.yellow, 'No API key configured, using offline keyword routing');
    return {
      classifier: createHeuristicClassifier(),
      synthesizer: { synthesize: async (messages) => fallbackSummary(messages) },
      workers: createOfflineWorkers(dataSource),
    };
  }

  const model = createChatModel(config);
  return {
    classifier: createLLMClassifier(model),
    synthesizer: createLLMSynthesizer(model),
    workers: createSpecialistWorkers({ model, dataSource }),
  };
}

// ============================================
// Interactive CLI
// ============================================
class AdvisorCLI {
  private rl: readline.Interface;
  private advisor: FinancialAdvisor | null = null;
  private userId: string | undefined = '1';

  constructor() {
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });
  }

  private printBanner() {
    console.log(`
${colors.bgBlue}${colors.bright}                                                            ${colors.reset}
${colors.bgBlue}${colors.bright}   ADVISOR CLI                                              ${colors.reset}
${colors.bgBlue}${colors.bright}                                                            ${colors.reset}

${colors.cyan}Commands:${colors.reset}
  ${colors.green}ask <question>${colors.reset}     Run one query and print the result
  ${colors.green}stream <question>${colors.reset}  Run one query and print each step
  ${colors.green}user <id>${colors.reset}          Set the user for following queries (none to clear)
  ${colors.green}config${colors.reset}             Show current configuration
  ${colors.green}help${colors.reset}               Show this help
  ${colors.green}exit${colors.reset}               Exit the CLI

${colors.dim}Anything else is streamed as a question.${colors.reset}
`);
  }

  async start() {
    this.printBanner();
    this.initAdvisor();
    this.prompt();
  }

  private initAdvisor() {
    const config = loadAdvisorConfig();
    if (initLangSmith()) {
      log('[CLI]', colors.dim, 'LangSmith tracing enabled');
    }
    this.advisor = new FinancialAdvisor({ collaborators: createCollaborators(config, loadDataSource()), config });
    log('[CLI]', colors.green, `Advisor ready (model ${config.model}, max turns ${config.maxTurns})`);
  }

  private prompt() {
    this.rl.question(`${colors.bright}advisor[user ${this.userId ?? '-'}]>${colors.reset} `, (input) => {
      const trimmed = input.trim();
      const done = trimmed ? this.handleCommand(trimmed) : Promise.resolve();
      done
        .catch((error: unknown) => {
          console.log(`${colors.red}Error: ${error instanceof Error ? error.message : String(error)}${colors.reset}`);
        })
        .finally(() => this.prompt());
    });
  }

  private async handleCommand(input: string) {
    const [command, ...args] = input.split(' ');
    const argString = args.join(' ');

    switch (command.toLowerCase()) {
      case 'ask':
        await this.ask(argString);
        break;
      case 'stream':
        await this.streamQuery(argString);
        break;
      case 'user':
        this.userId = !argString || argString === 'none' ? undefined : argString;
        log('[CLI]', colors.green, `User set to ${this.userId ?? '(none)'}`);
        break;
      case 'config':
        this.showConfig();
        break;
      case 'help':
        this.printBanner();
        break;
      case 'exit':
      case 'quit':
        console.log('Goodbye!');
        this.close();
        process.exit(0);
        break;
      default:
        await this.streamQuery(input);
    }
  }

  private async ask(query: string) {
    if (!query) {
      console.log(`${colors.yellow}Usage: ask <question>${colors.reset}`);
      return;
    }
    if (!this.advisor) {
      console.log(`${colors.red}Advisor not initialized${colors.reset}`);
      return;
    }

    try {
      logResult(await this.advisor.run(query, { userId: this.userId }));
    } catch (error) {
      this.reportFailure(error);
    }
  }

  private async streamQuery(query: string) {
    if (!query) {
      console.log(`${colors.yellow}Usage: stream <question>${colors.reset}`);
      return;
    }
    if (!this.advisor) {
      console.log(`${colors.red}Advisor not initialized${colors.reset}`);
      return;
    }

    console.log(`\n${colors.bgBlue}${colors.bright} STREAMING QUERY ${colors.reset}`);
    console.log(`${colors.blue}Query: ${colors.bright}${query}${colors.reset}\n`);

    try {
      const events = this.advisor.stream(query, { userId: this.userId });
      for (;;) {
        const next = await events.next();
        if (next.done) {
          logResult(next.value);
          break;
        }
        logStep(next.value);
      }
    } catch (error) {
      this.reportFailure(error);
    }
  }

  private reportFailure(error: unknown) {
    if (error instanceof OrchestrationError) {
      console.log(`${colors.red}Run failed: ${error.message}${colors.reset}`);
      console.log(`${colors.dim}Turns: ${error.turnCount}, ledger entries: ${error.ledger.length}${colors.reset}`);
      return;
    }
    console.log(`${colors.red}Error: ${error instanceof Error ? error.message : String(error)}${colors.reset}`);
  }

  private showConfig() {
    if (!this.advisor) {
      console.log(`${colors.red}Advisor not initialized${colors.reset}`);
      return;
    }

    const { apiKey, ...config } = this.advisor.config;
    console.log(`\n${colors.cyan}Current Configuration:${colors.reset}`);
    console.log(JSON.stringify({ ...config, apiKey: apiKey ? '(set)' : '(missing)' }, null, 2));
  }

  close() {
    this.rl.close();
  }
}

// ============================================
// Main Entry Point
// ============================================
async function main() {
  const cli = new AdvisorCLI();

  process.on('SIGINT', () => {
    console.log('\nGoodbye!');
    cli.close();
    process.exit(0);
  });

  await cli.start();
}

main().catch(console.error);
