import { parseRegistry } from '../../src/core/registry.js';
import { describeAction, type ActionOutcome, type ActionRequest, type ActionRunner } from '../../src/core/runner.js';
import type { Registry } from '../../src/types/registry.js';

export const BASE_DIR = '/opt/rigup-test';

export function registryFrom(raw: string): Registry {
  return parseRegistry(raw, 'test.yaml', BASE_DIR);
}

export interface FakeBehaviour {
  exitCode?: number | null;
  output?: string;
  error?: string;
  terminated?: boolean;
  delayMs?: number;
}

export interface FakeRunner {
  runner: ActionRunner;
  /** Action text of every call, in dispatch order. */
  calls: string[];
  requests: ActionRequest[];
}

/** Resolves every action through `behave`; unknown actions exit 0. */
export function fakeRunner(
  behave: (script: string, request: ActionRequest) => FakeBehaviour | undefined = () => undefined,
): FakeRunner {
  const calls: string[] = [];
  const requests: ActionRequest[] = [];
  const runner: ActionRunner = async (request) => {
    const script = describeAction(request.action);
    calls.push(script);
    requests.push(request);
    const behaviour = behave(script, request) ?? {};
    if (behaviour.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, behaviour.delayMs));
    }
    const outcome: ActionOutcome = {
      exitCode: behaviour.exitCode === undefined ? 0 : behaviour.exitCode,
      output: behaviour.output ?? '',
      error: behaviour.error,
      timedOut: false,
      terminated: behaviour.terminated ?? false,
      durationMs: behaviour.delayMs ?? 0,
    };
    return outcome;
  };
  return { runner, calls, requests };
}

export const CHAIN_REGISTRY = `
components:
  - id: a
    name: A
    install_action: install a
  - id: b
    name: B
    depends_on: [a]
    install_action: install b
  - id: c
    name: C
    install_action: install c
`;
