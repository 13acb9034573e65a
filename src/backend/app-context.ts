import { AnthropicChatProvider } from './llm/anthropic-provider';
import { createLLM, type LLM, type ModelCapability } from './llm/provider';
import { buildAgentSystemPrompt } from './prompts/agent';
import { configService, type ModelConfig } from './services/config.service';
import { createLogger } from './services/logger.service';
import { Session } from './session/session';
import { type Agent, Runtime, restoreDynamicSubagents } from './soul/agent';
import { Context } from './soul/context';
import { Soul } from './soul/soul';
import { Toolset } from './soul/toolset';
import { AskUserQuestionTool } from './tools/ask-user-question';
import { CreateSubagentTool } from './tools/create-subagent';
import { TaskTool } from './tools/task';

const logger = createLogger('app-context');

export const MAIN_AGENT_NAME = 'main';

export interface AppContextOptions {
  workDir: string;
  /** Resume this session, or create it under this id. A fresh id is used when unset. */
  sessionId?: string;
  sessionsDir?: string;
  yolo?: boolean;
  /** Use this model instead of the configured one; `null` runs without a model. */
  llm?: LLM | null;
}

export type AppContext = {
  session: Session;
  runtime: Runtime;
  agent: Agent;
  soul: Soul;
};

/** The configured Anthropic model, or null when no API key is set. */
export function createConfiguredLLM(
  config: ModelConfig = configService.getModelConfig()
): LLM | null {
  if (!config.apiKey) {
    logger.warn('ANTHROPIC_API_KEY is not set, running without a model');
    return null;
  }
  const provider = new AnthropicChatProvider({
    model: config.model,
    maxOutputTokens: config.maxOutputTokens,
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    thinkingBudget: config.thinkingBudget,
  });
  const capabilities: ModelCapability[] = ['image_in'];
  if (config.thinkingBudget) {
    capabilities.push('thinking');
  }
  return createLLM(provider, { maxContextSize: config.maxContextSize, capabilities });
}

/**
 * Open (or create) a session and assemble the main agent on it: runtime, builtin tools,
 * restored dynamic subagents and restored context.
 */
export async function createAppContext(options: AppContextOptions): Promise<AppContext> {
  const session = await Session.create(options.workDir, {
    id: options.sessionId,
    sessionsDir: options.sessionsDir,
  });
  const llm = options.llm === undefined ? createConfiguredLLM() : options.llm;
  const runtime = await Runtime.create({ llm, session, yolo: options.yolo });

  const toolset = new Toolset();
  toolset.add(new TaskTool(runtime));
  toolset.add(new CreateSubagentTool(runtime, toolset));
  toolset.add(new AskUserQuestionTool());
  restoreDynamicSubagents(runtime, toolset);

  const agent: Agent = {
    name: MAIN_AGENT_NAME,
    systemPrompt: buildAgentSystemPrompt(runtime.promptArgs),
    toolset,
    runtime,
  };

  const context = new Context(session.contextFile);
  const restored = await context.restore();
  logger.info('Agent ready', {
    sessionId: session.id,
    workDir: session.workDir,
    model: llm?.provider.modelName ?? null,
    restoredContext: restored,
  });

  return { session, runtime, agent, soul: new Soul(agent, context) };
}
