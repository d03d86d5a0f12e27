// This module decides whether a session may invoke a tool; the protocol only asks, it never decides.

import { ProtocolError } from '../utils/errors.js';

export interface PolicySubject {
  name: string;
  dangerous: boolean;
}

export interface ToolPolicy {
  readonly name: string;
  // Throws a policy_denied ProtocolError when the call must not run.
  authorize(tool: PolicySubject): void;
}

export const allowAllPolicy: ToolPolicy = {
  name: 'allow',
  authorize: () => undefined
};

export const denyDangerousPolicy: ToolPolicy = {
  name: 'deny',
  authorize: (tool) => {
    if (tool.dangerous) {
      throw new ProtocolError('policy_denied', `Tool ${tool.name} is dangerous and disabled by server policy.`, {
        tool: tool.name
      });
    }
  }
};

// This helper maps the configured policy name onto its implementation.
export function policyFromConfig(mode: 'allow' | 'deny'): ToolPolicy {
  return mode === 'deny' ? denyDangerousPolicy : allowAllPolicy;
}
