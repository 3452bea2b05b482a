import { ENV_PATH, hydrateEnv, loadConfig, loadCosSettings, loadLlmSettings } from './config';
import { runPipeline } from './pipeline';
import { createCosPublisher } from './services/cloud';
import { convertDocument } from './services/converter';
import { createTextService } from './services/llm';

async function bootstrap() {
  hydrateEnv(ENV_PATH);
  const config = await loadConfig();
  const cosSettings = loadCosSettings();
  console.log(`处理周期：${config.period}，收件箱：${config.paths.inboxDir}`);
  const report = await runPipeline(config, {
    convert: convertDocument,
    text: createTextService(loadLlmSettings()),
    ...(cosSettings ? { publisher: createCosPublisher(cosSettings) } : {})
  });
  console.log(
    `完成：暂存 ${report.staged} 个，成功 ${report.succeeded.length} 个，失败 ${report.failed.length} 个`
  );
  for (const failure of report.failed) {
    console.log(`  - ${failure.itemId} (${failure.stage})：${failure.reason}`);
  }
}

bootstrap().catch(error => {
  console.error('运行失败:', error);
  process.exitCode = 1;
});
