import 'source-map-support/register.js';
import chalk from 'chalk';
import ProgressBar from 'progress';

import { pacer } from '@scorm-pacer/core';
import type { RunnerProgressEvent } from '@scorm-pacer/core';
import Config, { printConfigStatus } from '@scorm-pacer/core/config.js';
import { timeNumberToString } from '@scorm-pacer/core/utils.js';

function createBar(total: number) {
  return new ProgressBar('📚 总进度 [:bar] :current/:total 门 :percent 已用时 :elapsedText', {
    head: '>',
    incomplete: ' ',
    total: Math.max(total, 1),
    width: 30,
  });
}

async function main() {
  printConfigStatus(Config);

  if (!Config.credential.username || !Config.credential.password) {
    console.error(chalk.red('❌ 请先在 .env 中设置 _ACCOUNT 和 _PASSWORD'));
    process.exitCode = 1;
    return;
  }

  const runner = pacer.create(Config);
  const startedAt = Date.now();
  let bar: ProgressBar | null = null;

  runner.onProgress((e: RunnerProgressEvent) => {
    switch (e.kind) {
      case 'runStart':
        if (Config.progressBar && e.totalCourses > 0) bar = createBar(e.totalCourses);
        break;
      case 'taskDone':
      case 'taskFailed':
        bar?.tick({ elapsedText: timeNumberToString((Date.now() - startedAt) / 1000) });
        break;
      case 'sessionRenewed':
        console.log(chalk.gray(`🔑 已切换到会话 #${e.sessionId}`));
        break;
      default:
        break;
    }
  });

  let interrupted = false;
  process.on('SIGINT', () => {
    if (interrupted) process.exit(130);
    interrupted = true;
    runner.stop();
  });

  const summary = await runner.start();

  console.log(chalk.blue('\n========== 学习结果 =========='));
  console.log(chalk.green(`✅ 完成 ${summary.done.length} 门`));
  for (const { course, reason } of summary.failed) {
    console.log(chalk.red(`❌ ${course.name}: ${reason}`));
  }
  if (summary.cancelled.length) {
    console.log(chalk.yellow(`⏹️ 未完成 ${summary.cancelled.length} 门，下次运行会从登记表续播`));
  }
  for (const course of summary.unconfirmed) {
    console.log(chalk.yellow(`⚠️ ${course.name}: 平台仍显示 ${course.progressPercent.toFixed(1)}%，未确认完成`));
  }
  if (summary.rejected.length) {
    console.log(chalk.yellow(`⚠️ ${summary.rejected.length} 门课程超出队列容量，未参与本次学习`));
  }
  console.log(chalk.blue(`⏱️ 总用时 ${timeNumberToString((Date.now() - startedAt) / 1000)}`));

  if (summary.failed.length) process.exitCode = 1;
}

main().catch((e: unknown) => {
  console.error(chalk.red('❌ 程序异常退出:'), e);
  process.exitCode = 1;
});
