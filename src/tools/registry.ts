/**
 * Tool registry. Steps name a tool; the registry resolves it. New domains are added
 * by registering a tool, without touching the engine.
 */
import { logger } from '@/services/logger';
import type { StepAction } from '@/types/core';
import type { DomainTool } from './tool-contract';

export class ToolRegistry {
  private tools = new Map<string, DomainTool>();

  constructor(tools: readonly DomainTool[] = []) {
    for (const tool of tools) this.register(tool);
  }

  register(tool: DomainTool): this {
    if (this.tools.has(tool.name)) {
      logger.warn('tools:replaced', { name: tool.name });
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): DomainTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  supports(name: string, action: StepAction): boolean {
    const tool = this.tools.get(name);
    if (!tool) return false;
    return !tool.actions || tool.actions.includes(action);
  }

  /** Domain a step routed to `name` belongs to: the registered tool's domain, else the name itself. */
  domainOf(name: string): string {
    return this.tools.get(name)?.domain ?? name;
  }

  /** First registered tool serving `domain` that accepts `action`, in registration order. */
  findFor(domain: string, action: StepAction): DomainTool | undefined {
    for (const tool of this.tools.values()) {
      if ((tool.domain ?? tool.name) !== domain) continue;
      if (!tool.actions || tool.actions.includes(action)) return tool;
    }
    return undefined;
  }
}
