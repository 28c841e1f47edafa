import cron, { type ScheduledTask } from "node-cron";
import { logger } from "../utils/logger";

/** Runs `task` on every cron tick; a failing tick is logged and the schedule keeps going. */
export function startScheduler(cronExp: string, task: () => Promise<unknown>, name = "task"): ScheduledTask {
  if (!cron.validate(cronExp)) {
    throw new Error(`无效的 cron 表达式: ${cronExp}`);
  }
  let running = false;
  logger.info({ cron: cronExp, task: name }, "定时任务已启动");
  return cron.schedule(cronExp, () => {
    // 上一轮未结束时跳过本轮，保证检查严格串行
    if (running) {
      logger.warn({ task: name }, "上一轮尚未结束，跳过本次触发");
      return;
    }
    running = true;
    task()
      .catch((e) => logger.error({ task: name, error: e instanceof Error ? e.message : String(e) }, "定时任务执行失败"))
      .finally(() => {
        running = false;
      });
  });
}
