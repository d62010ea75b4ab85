/**
 * Print the effectiveness summary of the configured store
 *
 * Usage:
 *   npm run report
 *   npm run report -- --export <ruleId> [--format table|document]
 */
import 'dotenv/config';
import { RULE_ENGINE_BACKEND, RULE_ENGINE_DATA_DIR, validateConfig } from '../src/shared/config.js';
import {
  EffectivenessStatus,
  RuleEffectivenessTracker,
  RuleParameterOptimizer,
  createRecordStore,
  exportHistory,
  optimizationHistoryRecordSchema,
  ruleEffectivenessSchema,
  type HistoryExportFormat,
} from '../src/rule-engine/index.js';

const STATUS_ICON: Record<EffectivenessStatus, string> = {
  [EffectivenessStatus.EFFECTIVE]: '✅',
  [EffectivenessStatus.INEFFECTIVE]: '❌',
  [EffectivenessStatus.NEEDS_IMPROVEMENT]: '⚠️',
  [EffectivenessStatus.UNKNOWN]: '❔',
};

function readOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

async function report() {
  const args = process.argv.slice(2);

  const config = validateConfig();
  if (!config.valid) {
    console.error('Invalid configuration:');
    for (const error of config.errors) console.error('  ' + error);
    process.exitCode = 1;
    return;
  }

  const tracker = new RuleEffectivenessTracker({
    store: createRecordStore('effectiveness', ruleEffectivenessSchema),
  });
  const optimizer = new RuleParameterOptimizer({
    store: createRecordStore('optimization-history', optimizationHistoryRecordSchema),
  });
  await Promise.all([tracker.initialize(), optimizer.initialize()]);

  const exportRuleId = readOption(args, '--export');
  if (exportRuleId) {
    const format: HistoryExportFormat = readOption(args, '--format') === 'document' ? 'document' : 'table';
    process.stdout.write(exportHistory(exportRuleId, optimizer.getOptimizationHistory(exportRuleId), format));
    return;
  }

  console.log('=== Rule Effectiveness ===');
  console.log(`Store: ${RULE_ENGINE_BACKEND} (${RULE_ENGINE_DATA_DIR})`);

  const records = tracker.getAllEffectiveness().sort((a, b) => a.ruleId.localeCompare(b.ruleId));
  for (const record of records) {
    const failureRate = record.totalValidations > 0 ? record.failedValidations / record.totalValidations : 0;
    const summary = optimizer.getOptimizationSummary(record.ruleId);
    console.log(
      `${STATUS_ICON[record.status]} ${record.ruleId} [${record.category}] ` +
        `validations=${record.totalValidations} failure_rate=${(failureRate * 100).toFixed(1)}% ` +
        `feedback=${record.positiveFeedback}+/${record.negativeFeedback}- ` +
        `optimizations=${summary.totalOptimizations}`
    );
  }

  const summary = tracker.getEffectivenessSummary();
  console.log('\n=== Summary ===');
  console.log('Rules:', summary.totalRules);
  console.log('Effective:', summary.effectiveRules);
  console.log('Ineffective:', summary.ineffectiveRules);
  console.log('Needs improvement:', summary.rulesNeedingImprovement);
  console.log('Effectiveness rate:', (summary.effectivenessRate * 100).toFixed(1) + '%');
}

report().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
