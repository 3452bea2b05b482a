import type { PipelineConfig, PipelineServices, RunReport, StagedItem, SummaryRef } from './types';
import {
  assembleHighlights,
  findRecoverableSummaries,
  findStagedItems,
  translatedHighlightsPath
} from './services/assembler';
import { publishStagedItems } from './services/cloud';
import { runConversions } from './services/orchestrator';
import { cleanupInbox, stageInbox } from './services/stager';
import { translateHighlights } from './services/translator';
import { removeStaleTempFiles } from './utils/fs';

/**
 * One run: stage the inbox, process every item, assemble and translate.
 * Staging finishes before any worker starts. With nothing new in the inbox
 * the run rebuilds from summaries already on disk, or failing that from the
 * files already in the store.
 */
export async function runPipeline(
  config: PipelineConfig,
  services: PipelineServices
): Promise<RunReport> {
  const report: RunReport = {
    period: config.period,
    staged: 0,
    recovered: false,
    succeeded: [],
    failed: []
  };

  const { storeDir, textDir, cleanedDir, summaryDir, finalDir } = config.paths;
  for (const dir of [storeDir, textDir, cleanedDir, summaryDir, finalDir]) {
    const removed = await removeStaleTempFiles(dir);
    if (removed) {
      console.log(`[cleanup] 已删除 ${removed} 个残留临时文件：${dir}`);
    }
  }

  const stage = await stageInbox(config);
  await cleanupInbox(config.paths.inboxDir, stage.failed);
  report.staged = stage.staged.length;

  if (services.publisher && stage.staged.length) {
    await publishStagedItems(stage.staged, config.period, services.publisher);
  }

  let items: StagedItem[] = stage.staged;
  let refs: SummaryRef[] = [];
  if (!items.length) {
    report.recovered = true;
    refs = await findRecoverableSummaries(config);
    if (refs.length) {
      console.log(`[recover] 没有新文件，使用已有的 ${refs.length} 份摘要重建 highlights`);
    } else {
      items = await findStagedItems(config);
      if (!items.length) {
        console.log('没有可处理的文件');
        return report;
      }
      console.log(`[recover] 没有新文件，重新处理存储区中的 ${items.length} 个文件`);
    }
  }

  if (items.length) {
    const batch = await runConversions(items, config, services);
    refs = batch.succeeded;
    report.failed = batch.failed;
  }
  report.succeeded = refs.map(ref => ref.itemId);

  if (!refs.length) {
    console.log('没有生成任何摘要，无需生成 highlights');
    return report;
  }

  const documentPath = await assembleHighlights(refs, config);
  if (!documentPath) {
    return report;
  }
  report.documentPath = documentPath;
  report.translation = await translateHighlights(services.text, {
    source: documentPath,
    target: translatedHighlightsPath(config),
    prompt: config.translationPrompt,
    timeoutMs: config.callTimeoutMs
  });
  return report;
}
