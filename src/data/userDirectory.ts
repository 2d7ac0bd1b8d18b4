/**
 * User/team directory — the read-only view of who exists and which teams they belong to.
 *
 * The core only consumes the `UserDirectory` contract. `loadUserDirectory` reads a
 * snapshot file at startup into an `InMemoryUserDirectory`, which also backs tests.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { isValidTimeZone } from '../core/clock.js';
import { ValidationError } from '../core/errors.js';

export interface UserDirectory {
  listUsers(): Promise<Set<string>>;
  /** Empty set for an unknown team. */
  teamMembers(teamId: string): Promise<Set<string>>;
  /** IANA zone that defines the user's calendar day, when known. */
  timeZoneOf?(userId: string): Promise<string | undefined>;
}

const directorySchema = z.object({
  users: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string().optional(),
      email: z.string().optional(),
      timeZone: z.string().refine(isValidTimeZone, 'unknown IANA time zone').optional()
    })
  ),
  teams: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().optional(),
        memberIds: z.array(z.string())
      })
    )
    .default([])
});

export type DirectorySnapshot = z.input<typeof directorySchema>;

export class InMemoryUserDirectory implements UserDirectory {
  private readonly users = new Map<string, { timeZone?: string }>();
  private readonly teams = new Map<string, Set<string>>();

  constructor(snapshot: DirectorySnapshot = { users: [] }) {
    const parsed = directorySchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new ValidationError('invalid directory snapshot', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      });
    }
    for (const user of parsed.data.users) {
      this.users.set(user.id, { timeZone: user.timeZone });
    }
    for (const team of parsed.data.teams) {
      this.teams.set(team.id, new Set(team.memberIds));
    }
  }

  async listUsers(): Promise<Set<string>> {
    return new Set(this.users.keys());
  }

  async teamMembers(teamId: string): Promise<Set<string>> {
    return new Set(this.teams.get(teamId) ?? []);
  }

  async timeZoneOf(userId: string): Promise<string | undefined> {
    return this.users.get(userId)?.timeZone;
  }

  addUser(userId: string, opts: { timeZone?: string; teamIds?: string[] } = {}): void {
    this.users.set(userId, { timeZone: opts.timeZone });
    for (const teamId of opts.teamIds ?? []) {
      const members = this.teams.get(teamId) ?? new Set<string>();
      members.add(userId);
      this.teams.set(teamId, members);
    }
  }

  removeUser(userId: string): void {
    this.users.delete(userId);
    for (const members of this.teams.values()) members.delete(userId);
  }
}

/** Loads a directory snapshot file (see data/directory.json for the shape). */
export function loadUserDirectory(filePath: string): InMemoryUserDirectory {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  const parsed = directorySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`invalid directory file ${filePath}`, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    });
  }
  return new InMemoryUserDirectory(parsed.data);
}
