import chalk from 'chalk';
import { getSafeConfig, type EnvironmentConfig } from './env-config.js';
import { loggers } from './logger.js';
import {
  logSection,
  logSeparator,
  logError,
  logWarningMessage,
  logSuccess,
} from './logger-extended.js';

export type HealthCheck = {
  name: string;
  status: 'ok' | 'warning' | 'error';
  message: string;
  suggestion?: string;
};

/**
 * Inspect the configuration without calling any external service
 */
export function collectHealthChecks(config: EnvironmentConfig): HealthCheck[] {
  return [
    checkProvider(config),
    checkWebhookSecret(config),
    checkReplyToken(config),
    checkCache(config),
    checkNodeVersion(),
  ];
}

/**
 * Print the health report
 * @returns false when a critical issue was found
 */
export function runDoctorCheck(config: EnvironmentConfig): boolean {
  logSection('Polyglot Relay Doctor', '🏥');

  const checks = collectHealthChecks(config);
  displayResults(checks);

  const hasErrors = checks.some((check) => check.status === 'error');
  const hasWarnings = checks.some((check) => check.status === 'warning');

  logSeparator('=', 60);

  if (hasErrors) {
    logError('❌ Critical issues found. Please fix the errors above.');
  } else if (hasWarnings) {
    logWarningMessage('⚠️  Some warnings found. Review the suggestions above.');
    logSuccess('✅ Ready to relay translations with basic features.');
  } else {
    logSuccess('✅ All checks passed! Ready to relay translations.');
  }

  return !hasErrors;
}

function checkProvider(config: EnvironmentConfig): HealthCheck {
  const safe = getSafeConfig(config);

  if (!safe.provider) {
    return {
      name: 'Translation provider',
      status: 'error',
      message: 'No provider configured',
      suggestion: 'Set OPENAI_API_KEY or ANTHROPIC_API_KEY',
    };
  }

  if (!safe.hasProviderKey) {
    return {
      name: 'Translation provider',
      status: 'error',
      message: `${safe.provider} selected but its API key is missing`,
      suggestion: `Set ${safe.provider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY'}`,
    };
  }

  return {
    name: 'Translation provider',
    status: 'ok',
    message: `${safe.provider} (${safe.model}), timeout ${safe.providerTimeoutMs}ms`,
  };
}

function checkWebhookSecret(config: EnvironmentConfig): HealthCheck {
  if (config.lineChannelSecret) {
    return { name: 'Webhook signature', status: 'ok', message: 'Channel secret configured' };
  }

  if (config.webhookAllowUnsigned) {
    return {
      name: 'Webhook signature',
      status: 'warning',
      message: 'Unsigned webhooks are accepted (development mode)',
      suggestion: 'Set LINE_CHANNEL_SECRET and unset WEBHOOK_ALLOW_UNSIGNED in production',
    };
  }

  return {
    name: 'Webhook signature',
    status: 'warning',
    message: 'No channel secret; every webhook delivery will be rejected',
    suggestion: 'Set LINE_CHANNEL_SECRET to enable the webhook',
  };
}

function checkReplyToken(config: EnvironmentConfig): HealthCheck {
  if (config.lineChannelAccessToken) {
    return { name: 'Reply credential', status: 'ok', message: 'Channel access token configured' };
  }

  return {
    name: 'Reply credential',
    status: 'warning',
    message: 'No channel access token; replies and profile lookups are disabled',
    suggestion: 'Set LINE_CHANNEL_ACCESS_TOKEN',
  };
}

function checkCache(config: EnvironmentConfig): HealthCheck {
  if (config.cacheTtlSeconds <= 0) {
    return {
      name: 'Translation cache',
      status: 'warning',
      message: 'Disabled (CACHE_TTL_SECONDS <= 0); every request calls the provider',
    };
  }

  return {
    name: 'Translation cache',
    status: 'ok',
    message: `TTL ${config.cacheTtlSeconds}s, up to ${config.cacheMaxEntries} entries`,
  };
}

function checkNodeVersion(): HealthCheck {
  const major = Number.parseInt(process.versions.node.split('.')[0], 10);

  if (major >= 20) {
    return { name: 'Node.js', status: 'ok', message: `v${process.versions.node}` };
  }

  return {
    name: 'Node.js',
    status: 'error',
    message: `v${process.versions.node} is not supported`,
    suggestion: 'Use Node.js 20 or newer',
  };
}

function displayResults(checks: HealthCheck[]): void {
  for (const check of checks) {
    const icon = getStatusIcon(check.status);
    const color = getStatusColor(check.status);

    loggers.info(`${icon} ${chalk.bold(check.name)}: ${color(check.message)}`);

    if (check.suggestion) {
      loggers.info(`   ${chalk.gray('💡 ' + check.suggestion)}`);
    }
  }
}

function getStatusIcon(status: HealthCheck['status']): string {
  switch (status) {
    case 'ok':
      return '✅';
    case 'warning':
      return '⚠️';
    default:
      return '❌';
  }
}

function getStatusColor(status: HealthCheck['status']) {
  switch (status) {
    case 'ok':
      return chalk.green;
    case 'warning':
      return chalk.yellow;
    default:
      return chalk.red;
  }
}
