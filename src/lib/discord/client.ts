import {
  ChatInputCommandInteraction,
  Client,
  Events,
  GatewayIntentBits,
  Message,
  MessageFlags,
  SlashCommandBuilder,
} from 'discord.js';
import { logger } from '../logger';
import { BattleLinkHandlerDeps, handleBattleLinkMessage, handlePingCommand, IncomingMessage } from './handlers';

/**
 * Adapt a discord.js message to the battle-link pipeline.
 * Returns undefined for channels the bot cannot post in.
 */
export function toIncomingMessage(message: Message): IncomingMessage | undefined {
  const { channel } = message;
  if (!('send' in channel)) {
    return undefined;
  }

  return {
    id: message.id,
    content: message.content,
    author: { bot: message.author.bot, tag: message.author.tag },
    channelId: message.channelId,
    guildId: message.guildId,
    deletable: message.deletable,
    channel: { send: options => channel.send(options) },
    delete: () => message.delete(),
  };
}

export class DiscordClient {
  public client: Client;

  constructor(private readonly deps: BattleLinkHandlerDeps) {
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers() {
    this.client.on(Events.ClientReady, readyClient => {
      logger.info({ guilds: readyClient.guilds.cache.size }, `Bot logged in as ${readyClient.user.tag}`);
    });

    this.client.on(Events.Error, error => {
      logger.error({ error }, 'Discord client error');
    });

    this.client.on(Events.Warn, info => {
      logger.warn({ info }, 'Discord warning');
    });

    this.client.on(Events.MessageCreate, message => {
      const incoming = toIncomingMessage(message);
      if (!incoming) return;

      handleBattleLinkMessage(incoming, this.deps)
        .then(outcome => {
          logger.debug({ messageId: message.id, outcome }, 'Message handled');
        })
        .catch(error => {
          logger.error({ messageId: message.id, error }, 'Battle link pipeline rejected');
        });
    });

    this.client.on(Events.InteractionCreate, interaction => {
      if (!interaction.isChatInputCommand()) return;

      this.handleCommand(interaction).catch(error => {
        logger.error({ commandName: interaction.commandName, error }, 'Command handler rejected');
      });
    });
  }

  private async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    logger.info({ commandName: interaction.commandName, user: interaction.user.tag }, 'Processing command');

    try {
      switch (interaction.commandName) {
        case 'ping':
          await handlePingCommand(interaction);
          break;
        default:
          logger.warn({ commandName: interaction.commandName }, 'Unknown command');
          await interaction.reply({ content: 'Unknown command', flags: MessageFlags.Ephemeral });
      }
    } catch (error) {
      logger.error({ commandName: interaction.commandName, user: interaction.user.tag, error }, 'Error handling command');

      const errorMessage = 'Sorry, there was an error processing your command.';
      if (interaction.replied || interaction.deferred) {
        await interaction.followUp({ content: errorMessage, flags: MessageFlags.Ephemeral });
      } else {
        await interaction.reply({ content: errorMessage, flags: MessageFlags.Ephemeral });
      }
    }
  }

  async login(token: string) {
    try {
      await this.client.login(token);
      logger.info('Successfully logged in to Discord');
    } catch (error) {
      logger.error({ error }, 'Failed to login to Discord');
      throw error;
    }
  }

  async registerCommands(commands: SlashCommandBuilder[]) {
    // Wait for client to be ready before registering commands
    if (!this.client.isReady()) {
      logger.info('Waiting for client to be ready before registering commands');
      await new Promise<void>(resolve => {
        this.client.once(Events.ClientReady, () => resolve());
      });
    }

    const application = this.client.application;
    if (!application) {
      throw new Error('Application not available');
    }

    const jsonCommands = commands.map(cmd => cmd.toJSON());
    await application.commands.set(jsonCommands);
    logger.info({ commands: jsonCommands.map(cmd => cmd.name) }, 'Successfully registered application commands');
  }

  async destroy(): Promise<void> {
    await this.client.destroy();
    logger.info('Discord client destroyed');
  }
}
