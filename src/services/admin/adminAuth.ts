import type { APIInteractionGuildMember, ChatInputCommandInteraction, GuildMember } from 'discord.js';
import type { AppEnv } from '../../config/env';

type AdminConfig = Pick<AppEnv, 'ADMIN_IDS' | 'ADMIN_ROLE_ID'>;

export function memberRoleIds(member: GuildMember | APIInteractionGuildMember | null): string[] {
  if (!member) return [];
  return Array.isArray(member.roles) ? member.roles : [...member.roles.cache.keys()];
}

export function isAdminUser(userId: string, roleIds: readonly string[], config: AdminConfig): boolean {
  // 1️⃣ ENV whitelist (comma-separated IDs)
  if (config.ADMIN_IDS.includes(userId)) return true;

  // 2️⃣ Admin role (guild members only)
  return Boolean(config.ADMIN_ROLE_ID) && roleIds.includes(config.ADMIN_ROLE_ID);
}

export function isAdmin(interaction: ChatInputCommandInteraction, config: AdminConfig): boolean {
  const roles = interaction.inGuild() ? memberRoleIds(interaction.member) : [];
  return isAdminUser(interaction.user.id, roles, config);
}
