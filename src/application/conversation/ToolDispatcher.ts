import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, OracleParseError } from '../../domain/common/Errors';
import { ParseResult, ok, fallback } from '../../domain/common/ParseResult';
import { SkillTaskResolver } from '../services/SkillTaskResolver';
import { AssignmentService } from '../services/AssignmentService';
import { activeTaskReminder } from './MessageTemplates';

export const TOOL_NAMES = ['assign_task_for_skill', 'complete_task', 'list_active_tasks'] as const;
export type ToolName = typeof TOOL_NAMES[number];

export interface ToolCall {
  name: string;
  argument: string | null;
}

export interface ToolContext {
  userId: string;
  assistantName: string;
}

type ToolHandler = (context: ToolContext, argument: string | null) => Promise<string>;

function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(tool => tool === name);
}

/**
 * Closed table of operations the oracle may invoke through [TOOL:...] tags.
 * Each handler returns the text to show the user.
 */
export class ToolDispatcher {
  private readonly handlers: Record<ToolName, ToolHandler>;

  constructor(
    private resolver: SkillTaskResolver,
    private assignments: AssignmentService,
    private logger: ILogger
  ) {
    this.handlers = {
      assign_task_for_skill: (context, skill) => this.assignTaskForSkill(context, skill),
      complete_task: (context, taskId) => this.completeTask(context, taskId),
      list_active_tasks: context => this.listActiveTasks(context)
    };
  }

  /**
   * Run a tool call. Unknown tools and missing arguments fall back to no
   * output; errors raised by a handler propagate.
   */
  async dispatch(context: ToolContext, call: ToolCall): Promise<ParseResult<string | null>> {
    if (!isToolName(call.name)) {
      this.logger.warn(`Unknown tool requested: ${call.name}`, { userId: context.userId });
      return fallback(null, new OracleParseError(`Unknown tool "${call.name}"`, call.name));
    }

    const needsArgument = call.name !== 'list_active_tasks';
    if (needsArgument && !call.argument) {
      return fallback(null, new OracleParseError(`Tool "${call.name}" requires an argument`, call.name));
    }

    this.logger.info(`Dispatching tool ${call.name}`, { userId: context.userId, argument: call.argument });
    return ok(await this.handlers[call.name](context, call.argument));
  }

  private async assignTaskForSkill(context: ToolContext, skill: string | null): Promise<string> {
    const resolved = await this.resolver.resolveNextTask(context.userId, skill ?? '');
    if (!resolved) {
      return `I couldn't find a new ${skill} task for you right now.`;
    }

    const { task } = resolved;
    const assignment = await this.assignments.assignActive(context.userId, task, `Assigned by ${context.assistantName}`);
    if (!assignment) {
      return `You already have *${task.title}* on your list.`;
    }
    return `I've assigned *${task.title}* to you. Try to finish it by ${assignment.expectedCompletionDate}.`;
  }

  private async completeTask(context: ToolContext, taskId: string | null): Promise<string> {
    try {
      await this.assignments.updateStatus(context.userId, taskId ?? '', 'completed');
    } catch (err) {
      if (err instanceof NotFoundError) {
        return `I couldn't find task ${taskId} in your list.`;
      }
      throw err;
    }

    const completed = await this.assignments.listCompletedTasks(context.userId);
    const title = completed.find(t => t.taskId === taskId)?.title ?? taskId;
    return `Nice work! *${title}* is marked as completed.`;
  }

  private async listActiveTasks(context: ToolContext): Promise<string> {
    const active = await this.assignments.listActiveTasks(context.userId);
    return activeTaskReminder(active.map(t => t.title));
  }
}
