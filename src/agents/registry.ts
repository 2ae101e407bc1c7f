/**
 * Agent registry
 *
 * Holds the agents of a pipeline in registration order. Field ownership is
 * a static partition: registering an agent that claims a field another
 * agent already owns is rejected.
 */

import { ConfigError } from '../errors/index.js';
import type { AgentSpec } from './types.js';

export class AgentRegistry {
  private readonly agents: AgentSpec[] = [];
  private readonly owners = new Map<string, string>();

  constructor(specs: readonly AgentSpec[] = []) {
    for (const spec of specs) {
      this.register(spec);
    }
  }

  /**
   * @throws ConfigError on a duplicate agent name or field name
   */
  register(spec: AgentSpec): void {
    if (this.agents.some((a) => a.name === spec.name)) {
      throw new ConfigError(`Agent "${spec.name}" is already registered`);
    }
    if (spec.fields.length === 0) {
      throw new ConfigError(`Agent "${spec.name}" declares no fields`);
    }

    const claimed = new Set<string>();
    for (const field of spec.fields) {
      const owner = this.owners.get(field.name);
      if (owner !== undefined || claimed.has(field.name)) {
        throw new ConfigError(
          `Field "${field.name}" of agent "${spec.name}" is already owned by "${owner ?? spec.name}"`,
          'Each field must belong to exactly one agent'
        );
      }
      claimed.add(field.name);
    }

    for (const name of claimed) {
      this.owners.set(name, spec.name);
    }
    this.agents.push(spec);
  }

  /** Agents in registration order */
  list(): readonly AgentSpec[] {
    return this.agents;
  }

  get(name: string): AgentSpec | undefined {
    return this.agents.find((a) => a.name === name);
  }

  ownerOf(field: string): string | undefined {
    return this.owners.get(field);
  }

  get size(): number {
    return this.agents.length;
  }
}
