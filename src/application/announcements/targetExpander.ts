import type { TargetSet } from '@/domain/announcement/types';
import type { DeviceStatePort } from '@/ports/DeviceStatePort';
import type { Logger } from '@/shared/logging/logger';
import { toStringList } from '@/shared/utils/guards';

/**
 * Projects a target id onto physical device ids. Groups are entities whose
 * state lists members under `entity_id`; nested groups are flattened.
 * `group_members` (player-side grouping) is not expanded; a coordinator is
 * addressed once, not again through its group.
 */
export class TargetExpander {
  constructor(
    private readonly devices: DeviceStatePort,
    private readonly log: Logger,
  ) {}

  public async expand(targetId: string): Promise<TargetSet> {
    const root = targetId.trim();
    if (!root) {
      return [];
    }
    const result: string[] = [];
    const visited = new Set<string>();
    await this.visit(root, visited, result);
    this.log.debug('target expanded', { targetId: root, devices: result });
    return result;
  }

  private async visit(id: string, visited: Set<string>, result: string[]): Promise<void> {
    if (visited.has(id)) {
      return;
    }
    visited.add(id);
    const state = await this.devices.getState(id);
    const members = toStringList(state?.attributes.entity_id);
    if (!members.length) {
      result.push(id);
      return;
    }
    for (const member of members) {
      await this.visit(member.trim(), visited, result);
    }
  }
}
