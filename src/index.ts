import { config } from './config.js';
import { RelayDaemon } from './control/daemon.js';
import { buildEngine } from './engine/index.js';
import { SlackTransport } from './transports/slack/index.js';
import { createLogger, describeError } from './utils/logger.js';
import {
  formatStartupIssue,
  StartupValidationError,
  type StartupIssue,
  validateStartupConfigOrThrow,
} from './utils/startup.js';

const logger = createLogger('relaybot', config.LOG_LEVEL);

const run = async () => {
  let startupIssues: StartupIssue[];
  try {
    startupIssues = validateStartupConfigOrThrow(config);
  } catch (error) {
    if (error instanceof StartupValidationError) {
      startupIssues = error.issues;
    } else {
      throw error;
    }
  }
  const hasStartupError = startupIssues.some((issue) => issue.severity === 'error');

  for (const issue of startupIssues) {
    const rendered = formatStartupIssue(issue);
    if (issue.severity === 'error') {
      logger.error(`[startup/${issue.area}] ${rendered}`);
    } else {
      logger.warn(`[startup/${issue.area}] ${rendered}`);
    }
  }

  if (hasStartupError) {
    throw new StartupValidationError(startupIssues);
  }

  const engine = buildEngine(config);
  let daemon: RelayDaemon | undefined;
  const slack = new SlackTransport({
    botToken: config.SLACK_BOT_TOKEN,
    appToken: config.SLACK_APP_TOKEN,
    signingSecret: config.SLACK_SIGNING_SECRET,
    logLevel: config.LOG_LEVEL,
    onEvent: async (event) => {
      if (!daemon) throw new Error('daemon_not_ready');
      return daemon.handle(event);
    },
    isKnownConversation: (conversationKey) => daemon?.store.has(conversationKey) ?? false,
    onReaction: async (reaction) => daemon?.handleReaction(reaction),
  });

  daemon = new RelayDaemon(config, { transport: slack, engine });
  await daemon.start();
  await slack.start();

  logger.info(
    `relaybot started engine=${config.ENGINE_MODE} verbosity=${config.VERBOSITY} channels=${Object.keys(config.CHANNEL_DIRS).length}`,
  );

  const running = daemon;
  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, draining in-flight turns (grace ${config.SHUTDOWN_GRACE_MS}ms)`);
    await running.stop(config.SHUTDOWN_GRACE_MS);
    await slack.stop().catch((error: unknown) => logger.error('transport stop failed', describeError(error)));
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('shutdown failed', describeError(error));
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
};

run().catch((err: unknown) => {
  if (err instanceof StartupValidationError) {
    logger.error(`startup checks failed, aborting (${err.errorCount} error(s))`);
    process.exit(1);
    return;
  }
  logger.error('fatal', describeError(err));
  process.exit(1);
});
