import {
  Dispatcher,
  getGlobalDispatcher,
  MockAgent,
  setGlobalDispatcher,
} from 'undici';

export interface MockAgentHandle {
  agent: MockAgent;
  restore(): Promise<void>;
}

/**
 * Routes every undici request of the test process to an in-process
 * MockAgent with real network access disabled.
 */
export function installMockAgent(): MockAgentHandle {
  const previous: Dispatcher = getGlobalDispatcher();
  const agent = new MockAgent();
  agent.disableNetConnect();
  setGlobalDispatcher(agent);

  return {
    agent,
    async restore() {
      setGlobalDispatcher(previous);
      await agent.close();
    },
  };
}
