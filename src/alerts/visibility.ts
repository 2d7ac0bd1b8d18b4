import type { UserDirectory } from '../data/userDirectory.js';
import type { Visibility } from '../core/types.js';

/**
 * Expands a visibility descriptor into the set of targeted user ids.
 *
 * Unknown team and user ids are dropped rather than rejected, and an empty
 * result is a valid target set.
 */
export class VisibilityResolver {
  constructor(private readonly directory: UserDirectory) {}

  async resolve(visibility: Visibility): Promise<Set<string>> {
    switch (visibility.kind) {
      case 'organization':
        return this.directory.listUsers();

      case 'team': {
        const targets = new Set<string>();
        const memberSets = await Promise.all(
          [...new Set(visibility.teamIds)].map((teamId) => this.directory.teamMembers(teamId))
        );
        for (const members of memberSets) {
          for (const userId of members) targets.add(userId);
        }
        return targets;
      }

      case 'user': {
        const known = await this.directory.listUsers();
        return new Set(visibility.userIds.filter((userId) => known.has(userId)));
      }

      default:
        return assertNever(visibility);
    }
  }
}

function assertNever(value: never): never {
  throw new Error(`unhandled visibility ${JSON.stringify(value)}`);
}
