#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config.js';
import { createRuntime } from './runtime.js';
import { renderOutcome, describeAction } from './agent/messages.js';
import { promptApproval } from './policy/approvals.js';
import type { StepResult } from './agent/types.js';

const program = new Command();

program
  .name('triage-agent')
  .description('Security investigation agent: plan, approve and run read-only investigation tools')
  .version('0.1.0');

program.command('tools')
  .description('List the investigation tools and their arguments')
  .action(() => {
    const { orchestrator } = createRuntime(loadConfig());
    const tools = orchestrator.listTools();
    console.log(chalk.bold(`Tools (${tools.length}):`));
    for (const t of tools) {
      console.log(`- ${chalk.cyan(t.name)}${t.sensitive ? ' [sensitive]' : ''}: ${t.description}`);
      for (const a of t.arguments) {
        const bounds = a.enum ? ` one of ${a.enum.join('|')}` : a.min !== undefined || a.max !== undefined ? ` ${a.min ?? ''}..${a.max ?? ''}` : '';
        console.log(chalk.gray(`    ${a.name}${a.required ? '' : '?'}: ${a.type}${bounds}${a.description ? ` (${a.description})` : ''}`));
      }
    }
  });

program.command('investigate')
  .argument('<goal...>', 'what to investigate')
  .option('--approval-mode <mode>', 'approval mode: auto | manual')
  .option('--max-steps <n>', 'planner steps per run', (v) => parseInt(v, 10))
  .option('--metrics', 'print metrics in Prometheus text format when done')
  .action(async (goalParts: string[], opts: { approvalMode?: string; maxSteps?: number; metrics?: boolean }) => {
    const runtime = createRuntime(loadConfig());
    const { orchestrator } = runtime;
    const session = await orchestrator.createSession(opts.approvalMode);
    console.log(chalk.gray(`Session: ${session.id} (${session.approvalMode})`));
    await orchestrator.postMessage(session.id, goalParts.join(' '));

    const ac = new AbortController();
    process.once('SIGINT', () => { ac.abort(); });

    for (;;) {
      const res = await orchestrator.run(session.id, { maxSteps: opts.maxSteps, signal: ac.signal });
      res.steps.forEach(printStep);
      if (res.status === 'awaiting_approval') {
        const pending = res.session.pendingAction;
        if (pending && await promptApproval(describeAction(pending.tool, pending.args))) {
          printStep(await orchestrator.approve(session.id));
          continue;
        }
        printStep(await orchestrator.reject(session.id, 'denied by operator'));
        continue;
      }
      if (res.status === 'step_limit_reached') console.log(chalk.yellow(`\nReached step limit. Session ${session.id} can be continued.`));
      if (res.status === 'stopped') console.log(chalk.yellow('\nStopped by user.'));
      if (res.status === 'error' && res.error) console.log(chalk.red(`\n${res.error.kind}: ${res.error.message}`));
      break;
    }

    if (opts.metrics) console.log('\n' + runtime.metrics.exportPrometheusMetrics());
    await runtime.shutdown();
  });

program.command('analyze')
  .argument('<query...>', 'natural-language question about the indexed events')
  .option('--index <name>', 'index or pattern to search')
  .option('--time-range <range>', 'relative window, e.g. 24h or 7d')
  .description('Translate a question into a search, run it and summarize the matches')
  .action(async (queryParts: string[], opts: { index?: string; timeRange?: string }) => {
    const { analyzer } = createRuntime(loadConfig());
    const res = await analyzer.analyze({ query: queryParts.join(' '), index: opts.index, timeRange: opts.timeRange });
    console.log(chalk.bold(`Matches: ${res.total}`));
    console.log(res.insights);
    for (const s of res.samples) {
      console.log(chalk.gray(`- ${String(s['@timestamp'] ?? '?')} ${s.host ?? '?'}: ${s.message ?? ''}`));
    }
  });

function printStep(step: StepResult): void {
  switch (step.status) {
    case 'executed':
      console.log(chalk.yellow(`Action: ${describeAction(step.decision.tool, step.decision.args)}`));
      if (step.decision.rationale) console.log(chalk.gray(`Rationale: ${step.decision.rationale}`));
      console.log((step.result.ok ? chalk.cyan : chalk.red)(`  → ${renderOutcome(step.result)}`));
      break;
    case 'final':
      console.log(chalk.bold('\n✅ Final Answer:'));
      console.log(step.answer);
      break;
    case 'awaiting_approval':
      console.log(chalk.magenta(`Pending approval: ${describeAction(step.pendingAction.tool, step.pendingAction.args)}`));
      break;
    case 'discarded':
      console.log(chalk.gray(`Discarded: ${describeAction(step.pendingAction.tool, step.pendingAction.args)}`));
      break;
  }
}

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
