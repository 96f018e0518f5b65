import { SlashCommandBuilder } from 'discord.js';

export const commands = [new SlashCommandBuilder().setName('ping').setDescription('Check that the bot is alive')];
