/**
 * Tool Registry
 *
 * Explicit name → registration map. Tools are added by a `register` call
 * each; nothing is discovered implicitly.
 */

import { createConfigError, type ToolRegistration } from '@crewroom/types';

export class ToolRegistry {
  private tools = new Map<string, ToolRegistration>();

  register(registration: ToolRegistration): void {
    if (this.tools.has(registration.name)) {
      throw createConfigError(`Tool '${registration.name}' is already registered`, {
        component: 'tools',
        details: { tool: registration.name },
      });
    }
    this.tools.set(registration.name, registration);
  }

  registerAll(registrations: Iterable<ToolRegistration>): void {
    for (const registration of registrations) {
      this.register(registration);
    }
  }

  get(name: string): ToolRegistration | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolRegistration[] {
    return [...this.tools.values()];
  }

  /**
   * Tool block for system prompts; empty when nothing is registered
   */
  describe(): string {
    if (this.tools.size === 0) {
      return '';
    }

    const lines = [
      'Available Tools (Call them using <tool_call name="tool_name">argument_content</tool_call>):',
      ...this.list().map((tool) => `- ${tool.name}: ${tool.description}`),
    ];
    return lines.join('\n');
  }
}
