import axios from 'axios';
import { notificationConfig } from '../config';
import { NotificationConfig, SwapRecord, SwapSettlementListener, SwapStatistics } from '../types';
import { logError, logger } from '../utils/logger';
import { formatUsd } from '../utils/usd';

export type NotificationType = 'success' | 'error' | 'warning';

interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  timestamp: string;
  fields?: { name: string; value: string; inline: boolean }[];
}

function notificationTypeFor(record: SwapRecord): NotificationType {
  switch (record.status) {
    case 'Completed':
      return 'success';
    case 'Recovered':
      return 'warning';
    default:
      return 'error';
  }
}

function describeSettlement(record: SwapRecord): string {
  switch (record.status) {
    case 'Completed':
      return `Swap ${record.swapId} completed on chain ${record.destinationChain}`;
    case 'Recovered':
      return `Swap ${record.swapId} was recovered`;
    default:
      return `Swap ${record.swapId} failed: ${record.failureReason ?? 'unknown reason'}`;
  }
}

export class NotificationService implements SwapSettlementListener {
  constructor(private readonly settings: NotificationConfig = notificationConfig) {}

  async onSwapSettled(record: SwapRecord): Promise<void> {
    await this.sendNotification(notificationTypeFor(record), describeSettlement(record), record);
  }

  async sendNotification(type: NotificationType, message: string, record?: SwapRecord): Promise<void> {
    const promises: Promise<void>[] = [];

    if (this.settings.discordWebhook) {
      promises.push(this.sendDiscordNotification(this.settings.discordWebhook, type, message, record));
    }

    if (this.settings.telegramBotToken && this.settings.telegramChatId) {
      promises.push(
        this.sendTelegramNotification(this.settings.telegramBotToken, this.settings.telegramChatId, type, message, record)
      );
    }

    await Promise.allSettled(promises);
  }

  async sendDailySummary(stats: SwapStatistics): Promise<void> {
    const message = `Daily Summary:\n` +
      `Total Swaps: ${stats.totalSwaps}\n` +
      `Completed: ${stats.successfulSwaps}\n` +
      `Failed: ${stats.failedSwaps}\n` +
      `Recovered: ${stats.recoveredSwaps}\n` +
      `Total Volume: $${formatUsd(stats.totalVolumeUSD)}\n` +
      `Total Savings: $${formatUsd(stats.totalSavingsUSD)}`;

    await this.sendNotification('success', message);
  }

  private async sendDiscordNotification(
    webhook: string,
    type: NotificationType,
    message: string,
    record?: SwapRecord
  ): Promise<void> {
    try {
      const color = type === 'success' ? 0x00ff00 : type === 'error' ? 0xff0000 : 0xffaa00;

      const embed: DiscordEmbed = {
        title: `Gas Optimizer - ${type.toUpperCase()}`,
        description: message,
        color,
        timestamp: new Date().toISOString(),
      };

      if (record) {
        embed.fields = [
          { name: 'Route', value: `${record.sourceChain} -> ${record.destinationChain}`, inline: true },
          { name: 'In', value: `${record.amountIn} ${record.tokenIn}`, inline: true },
          { name: 'Out', value: `${record.amountOut} ${record.tokenOut}`, inline: true },
          { name: 'Expected Savings', value: `$${formatUsd(record.expectedSavingsUSD)}`, inline: true },
          { name: 'Status', value: record.status, inline: true },
          { name: 'Bridge Reference', value: record.bridgeReferenceId || 'N/A', inline: false },
        ];
      }

      await axios.post(webhook, { embeds: [embed] });

      logger.debug('Discord notification sent');
    } catch (error) {
      logError('Failed to send Discord notification', error);
    }
  }

  private async sendTelegramNotification(
    botToken: string,
    chatId: string,
    type: NotificationType,
    message: string,
    record?: SwapRecord
  ): Promise<void> {
    try {
      const emoji = type === 'success' ? '✅' : type === 'error' ? '❌' : '⚠️';
      let text = `${emoji} *Gas Optimizer ${type.toUpperCase()}*\n\n${message}`;

      if (record) {
        text += '\n\n';
        text += `*Route:* ${record.sourceChain} -> ${record.destinationChain}\n`;
        text += `*In:* ${record.amountIn} ${record.tokenIn}\n`;
        text += `*Out:* ${record.amountOut} ${record.tokenOut}\n`;
        text += `*Expected Savings:* $${formatUsd(record.expectedSavingsUSD)}\n`;
        text += `*Status:* ${record.status}`;
        if (record.bridgeReferenceId) {
          text += `\n*Bridge Reference:* \`${record.bridgeReferenceId}\``;
        }
      }

      const url = `https://api.telegram.org/bot${botToken}/sendMessage`;
      await axios.post(url, {
        chat_id: chatId,
        text,
        parse_mode: 'Markdown',
      });

      logger.debug('Telegram notification sent');
    } catch (error) {
      logError('Failed to send Telegram notification', error);
    }
  }
}
