/**
 * Availability Registry
 *
 * In-memory enable flag per agent type. Toggles apply immediately; writes to
 * the agent_settings collection happen in the background, one at a time.
 */

import { componentLogger } from '../config/logger';
import { RecordStore } from '../db/recordStore';
import {
  AGENT_TYPES,
  AgentType,
  describeError,
  isAgentType,
  isJsonObject,
  UnknownAgentTypeError
} from '../types';

const logger = componentLogger('availability');

export const SETTINGS_COLLECTION = 'agent_settings';
export const SETTING_TYPE = 'agent_status';

export type AvailabilityMap = Record<AgentType, boolean>;

function allEnabled(): AvailabilityMap {
  return {
    orchestrator: true,
    email: true,
    lead: true,
    tracker: true,
    finance: true,
    marketing: true,
    client_services: true
  };
}

export class AvailabilityRegistry {
  private flags: AvailabilityMap = allEnabled();
  private settingsKey: string | number | null = null;
  private persistChain: Promise<void> = Promise.resolve();

  constructor(private readonly store: RecordStore) {}

  /**
   * Load saved flags. Any failure leaves every agent enabled.
   */
  async hydrate(): Promise<void> {
    try {
      const rows = await this.store.readItems(SETTINGS_COLLECTION, {
        filter: { setting_type: { _eq: SETTING_TYPE } },
        limit: 1
      });
      const row = rows[0];
      if (!row) {
        logger.info('No saved agent availability, all agents enabled');
        this.flags = allEnabled();
        return;
      }

      const saved = row.settings;
      if (!isJsonObject(saved)) {
        throw new Error('agent_status settings are not an object');
      }

      const flags = allEnabled();
      for (const [agentType, enabled] of Object.entries(saved)) {
        if (isAgentType(agentType) && typeof enabled === 'boolean') {
          flags[agentType] = enabled;
        }
      }

      this.settingsKey = typeof row.id === 'string' || typeof row.id === 'number' ? row.id : null;
      this.flags = flags;
      logger.info('Agent availability loaded', { flags });
    } catch (error) {
      this.flags = allEnabled();
      logger.warn('Could not load agent availability, all agents enabled', {
        error: describeError(error)
      });
    }
  }

  isEnabled(agentType: string): boolean {
    return isAgentType(agentType) ? this.flags[agentType] : false;
  }

  enable(agentType: string): AvailabilityMap {
    return this.set(agentType, true);
  }

  disable(agentType: string): AvailabilityMap {
    return this.set(agentType, false);
  }

  toggle(agentType: string): AvailabilityMap {
    return this.set(agentType, !this.isEnabled(agentType));
  }

  enableAll(): AvailabilityMap {
    return this.setAll(true);
  }

  disableAll(): AvailabilityMap {
    return this.setAll(false);
  }

  snapshot(): AvailabilityMap {
    return { ...this.flags };
  }

  /**
   * Resolves once every queued write has settled
   */
  flush(): Promise<void> {
    return this.persistChain;
  }

  private set(agentType: string, enabled: boolean): AvailabilityMap {
    if (!isAgentType(agentType)) {
      throw new UnknownAgentTypeError(agentType);
    }
    this.flags[agentType] = enabled;
    logger.info(`Agent ${agentType} ${enabled ? 'enabled' : 'disabled'}`);
    this.schedulePersist();
    return this.snapshot();
  }

  private setAll(enabled: boolean): AvailabilityMap {
    for (const agentType of AGENT_TYPES) {
      this.flags[agentType] = enabled;
    }
    logger.info(`All agents ${enabled ? 'enabled' : 'disabled'}`);
    this.schedulePersist();
    return this.snapshot();
  }

  private schedulePersist(): void {
    const flags = this.snapshot();
    this.persistChain = this.persistChain.then(() => this.persist(flags));
  }

  private async persist(flags: AvailabilityMap): Promise<void> {
    try {
      if (this.settingsKey !== null) {
        await this.store.updateItem(SETTINGS_COLLECTION, this.settingsKey, { settings: { ...flags } });
        return;
      }

      const existing = await this.store.readItems(SETTINGS_COLLECTION, {
        filter: { setting_type: { _eq: SETTING_TYPE } },
        limit: 1
      });
      const row = existing[0];
      if (row && (typeof row.id === 'string' || typeof row.id === 'number')) {
        this.settingsKey = row.id;
        await this.store.updateItem(SETTINGS_COLLECTION, row.id, { settings: { ...flags } });
        return;
      }

      const created = await this.store.createItem(SETTINGS_COLLECTION, {
        setting_type: SETTING_TYPE,
        settings: { ...flags }
      });
      if (typeof created.id === 'string' || typeof created.id === 'number') {
        this.settingsKey = created.id;
      }
    } catch (error) {
      logger.warn('Failed to persist agent availability', { error: describeError(error) });
    }
  }
}
