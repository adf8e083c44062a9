import {
  ChatTurn,
  EngagementState,
  QuickReplyButton,
  SpeakerRole,
  TurnResponse,
  UserPreferences,
  UserTaskView
} from '../../types';
import { IChatRepository } from '../../domain/repositories/IChatRepository';
import { ICompletionOracle } from '../../domain/services/ICompletionOracle';
import { INotifier } from '../../domain/services/INotifier';
import { IPromptLoader } from '../../domain/services/IPromptLoader';
import { IEventBus } from '../../domain/events/IEventBus';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { ILogger } from '../../domain/common/ILogger';
import { Clock, systemClock, toDateString } from '../../domain/common/Clock';
import { ParseResult } from '../../domain/common/ParseResult';
import { NotFoundError, toError } from '../../domain/common/Errors';
import { EngagementService } from '../services/EngagementService';
import { AssignmentService } from '../services/AssignmentService';
import { PreferenceService } from '../services/PreferenceService';
import { CatalogService } from '../services/CatalogService';
import { TaskRecommendationValidator } from '../services/TaskRecommendationValidator';
import { ToolDispatcher } from './ToolDispatcher';
import { UserTurnQueue } from './UserTurnQueue';
import { matchQuickReply, GREETING_BUTTONS, PROGRAM_BUTTONS } from './QuickReplies';
import { parseControlTags, resolvePostponeUntil } from './ControlTagParser';
import { parseIntent, parseNameDetection, parseTaskProposals } from './OracleResponseParser';
import * as templates from './MessageTemplates';

export interface TurnInput {
  userId: string;
  /** Absent or blank runs a proactive check instead of a reply. */
  message?: string | null;
}

export interface OrchestratorOptions {
  assistantDefaultName: string;
  postponeDefaultDays: number;
  historyWindow: number;
}

export interface ConversationOrchestratorDeps {
  engagement: EngagementService;
  assignments: AssignmentService;
  preferences: PreferenceService;
  catalog: CatalogService;
  validator: TaskRecommendationValidator;
  tools: ToolDispatcher;
  chatRepo: IChatRepository;
  oracle: ICompletionOracle;
  prompts: IPromptLoader;
  notifier: INotifier;
  eventBus: IEventBus;
  idGenerator: IIdGenerator;
  logger: ILogger;
  queue?: UserTurnQueue;
  clock?: Clock;
  options: OrchestratorOptions;
}

const GREETING_WORDS = new Set([
  'hi', 'hii', 'hiii', 'hello', 'helo', 'hey', 'heya', 'hiya', 'yo', 'hola', 'namaste',
  'howdy', 'sup', 'greetings', 'good', 'morning', 'afternoon', 'evening', 'there'
]);

/**
 * Short greetings are never names, whatever the oracle says.
 */
export function isGreeting(text: string): boolean {
  const words = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(Boolean);
  return words.length > 0 && words.every(word => GREETING_WORDS.has(word));
}

/**
 * Drives one turn of dialogue per inbound message.
 *
 * Phases: NEW sends the welcome and asks for a name; AWAITING_NAME waits
 * for one; AWAITING_PROFILE and CONVERSING share the general flow (quick
 * replies, then intent classification). Turns for one user run one at a
 * time. A turn that throws is logged and answered with an apology.
 */
export class ConversationOrchestrator {
  private readonly queue: UserTurnQueue;
  private readonly clock: Clock;

  constructor(private readonly deps: ConversationOrchestratorDeps) {
    this.queue = deps.queue ?? new UserTurnQueue();
    this.clock = deps.clock ?? systemClock;
  }

  async handleTurn(input: TurnInput): Promise<TurnResponse> {
    const text = input.message?.trim();
    if (!text) {
      return this.runProactiveCheck(input.userId);
    }
    return this.serialized(input.userId, () => this.processMessage(input.userId, text));
  }

  /**
   * Nudge a user who has not written. Postponed users are skipped silently.
   */
  async runProactiveCheck(userId: string): Promise<TurnResponse> {
    return this.serialized(userId, async () => {
      const state = await this.deps.engagement.loadCurrent(userId);

      if (state.buddyStatus === 'POSTPONED') {
        this.logFor(userId).info('Proactive check skipped: contact postponed', {
          nextContactAt: state.nextContactAt
        });
        return { status: 'skipped', message: null, phase: state.onboardingPhase };
      }
      if (state.onboardingPhase === 'NEW') {
        this.logFor(userId).info('Proactive check skipped: user has never written');
        return { status: 'skipped', message: null, phase: state.onboardingPhase };
      }

      const preferences = await this.deps.preferences.getPreferences(userId);
      const activeTasks = await this.deps.assignments.listActiveTasks(userId);

      if (activeTasks.length > 0) {
        const message = templates.activeTaskReminder(activeTasks.map(t => t.title));
        await this.deliver(userId, message, []);
        return { status: 'success', message, phase: state.onboardingPhase, activeTasks };
      }

      if (preferences.length > 0) {
        const message = templates.preferencesAnnouncement(preferences);
        const buttons = preferenceButtons(preferences);
        await this.deliver(userId, message, buttons);
        return { status: 'success', message, buttons, phase: state.onboardingPhase };
      }

      await this.deliver(userId, templates.IDLE_NUDGE, []);
      return { status: 'success', message: templates.IDLE_NUDGE, phase: state.onboardingPhase };
    });
  }

  /**
   * Tell the user their preferences were saved, with one button per skill.
   */
  async announcePreferences(prefs: UserPreferences): Promise<TurnResponse> {
    return this.serialized(prefs.userId, async () => {
      const state = await this.deps.engagement.loadCurrent(prefs.userId);
      if (prefs.preferences.length === 0) {
        return { status: 'skipped', message: null, phase: state.onboardingPhase };
      }

      const message = templates.preferencesAnnouncement(prefs.preferences);
      const buttons = preferenceButtons(prefs.preferences);
      await this.deliver(prefs.userId, message, buttons);
      return { status: 'success', message, buttons, phase: state.onboardingPhase };
    });
  }

  /**
   * The user's transcript, most recent `limit` turns in chronological order.
   * @throws {NotFoundError} if the user has never been in a conversation
   */
  async getTranscript(userId: string, limit?: number): Promise<ChatTurn[]> {
    const session = await this.deps.chatRepo.findByUser(userId);
    if (!session) {
      throw new NotFoundError('Conversation', userId);
    }
    return limit === undefined ? session.turns : session.turns.slice(-limit);
  }

  private serialized(userId: string, work: () => Promise<TurnResponse>): Promise<TurnResponse> {
    return this.queue.run<TurnResponse>(userId, async () => {
      try {
        return await work();
      } catch (err) {
        this.logFor(userId).error('Turn failed', toError(err));
        return { status: 'error', message: templates.APOLOGY };
      }
    });
  }

  private async processMessage(userId: string, text: string): Promise<TurnResponse> {
    const state = await this.deps.engagement.loadCurrent(userId);
    // Rendered before the new turn is stored; prompts carry the message separately.
    const history = await this.history(userId);
    await this.appendTurn(userId, 'user', text);

    switch (state.onboardingPhase) {
      case 'NEW':
        return this.welcome(state);
      case 'AWAITING_NAME':
        return this.handleNameOffer(state, text, history);
      case 'AWAITING_PROFILE':
      case 'CONVERSING':
        return this.handleGeneral(state, text, history);
    }
  }

  private async welcome(state: EngagementState): Promise<TurnResponse> {
    const updated = await this.deps.engagement.setPhase(state.userId, 'AWAITING_NAME');
    return this.reply(state.userId, {
      status: 'success',
      message: templates.welcome(this.deps.options.assistantDefaultName),
      phase: updated.onboardingPhase
    });
  }

  private async handleNameOffer(state: EngagementState, text: string, history: string): Promise<TurnResponse> {
    const { userId } = state;
    const reprompt = (): Promise<TurnResponse> =>
      this.reply(userId, { status: 'success', message: templates.NAME_REPROMPT, phase: state.onboardingPhase });

    if (isGreeting(text)) {
      return reprompt();
    }

    const prompt = await this.deps.prompts.render('name_detection', {
      user_message: text,
      history
    });
    const detection = this.unwrap(userId, parseNameDetection(await this.deps.oracle.complete(prompt)));

    if (!detection || isGreeting(detection)) {
      return reprompt();
    }

    const updated = await this.deps.engagement.setAssistantName(userId, detection);
    this.logFor(userId).info(`Assistant renamed to "${detection}"`);
    return this.reply(userId, {
      status: 'success',
      message: templates.greeting(detection),
      buttons: GREETING_BUTTONS,
      phase: updated.onboardingPhase
    });
  }

  private async handleGeneral(state: EngagementState, text: string, history: string): Promise<TurnResponse> {
    const { userId } = state;

    const quickReply = matchQuickReply(text);
    if (quickReply) {
      const updated = await this.deps.engagement.setActive(userId);
      return this.reply(userId, { status: 'success', message: quickReply.response, phase: updated.onboardingPhase });
    }

    const intentPrompt = await this.deps.prompts.render('intent_classification', { user_message: text, history });
    const intent = this.unwrap(userId, parseIntent(await this.deps.oracle.complete(intentPrompt)));
    this.logFor(userId).info(`Intent classified as ${intent}`);

    switch (intent) {
      case 'task_assignment':
        return this.recommendTasks(state, text, history);
      case 'buddy_response':
        return this.buddyResponse(state, text, history);
      case 'general_conversation':
        return this.generalConversation(state, text, history);
    }
  }

  private async recommendTasks(state: EngagementState, text: string, history: string): Promise<TurnResponse> {
    const { userId } = state;
    const [preferences, available] = await Promise.all([
      this.deps.preferences.getPreferences(userId),
      this.availableTasks(userId)
    ]);

    const prompt = await this.deps.prompts.render('task_assignment', {
      assistant_name: this.assistantName(state),
      user_message: text,
      history,
      preferences: preferences.join(', ') || 'none',
      available_tasks: available || 'none'
    });
    const candidates = this.unwrap(userId, parseTaskProposals(await this.deps.oracle.complete(prompt)));

    const { tasks } = await this.deps.validator.validate(userId, candidates);
    await this.deps.assignments.assignRecommended(userId, tasks);

    return this.reply(userId, {
      status: 'success',
      intent: 'task_assignment',
      message: templates.recommendedTasks(tasks),
      tasks,
      phase: state.onboardingPhase
    });
  }

  private async buddyResponse(state: EngagementState, text: string, history: string): Promise<TurnResponse> {
    const { userId } = state;
    const log = this.logFor(userId);
    const activeBefore = await this.deps.assignments.listActiveTasks(userId);

    const prompt = await this.deps.prompts.render('buddy_response', {
      assistant_name: this.assistantName(state),
      user_message: text,
      history,
      today: toDateString(this.clock()),
      active_tasks: taskLines(activeBefore)
    });
    const parsed = parseControlTags(await this.deps.oracle.complete(prompt));
    if (parsed.ignored.length > 0) {
      log.warn('Ignored unrecognized control tags', { tags: parsed.ignored });
    }

    let acknowledgement: string | null = null;
    let buttons: QuickReplyButton[] | undefined;
    let refresh = false;
    const toolOutput: string[] = [];

    for (const command of parsed.commands) {
      switch (command.kind) {
        case 'busy':
          await this.deps.engagement.setBusy(userId);
          acknowledgement = templates.busyAcknowledgement();
          break;
        case 'postpone': {
          const until = resolvePostponeUntil(command.argument, this.clock, this.deps.options.postponeDefaultDays);
          await this.deps.engagement.setPostponed(userId, until);
          acknowledgement = templates.postponeAcknowledgement(toDateString(until));
          break;
        }
        case 'confirm':
          refresh = true;
          acknowledgement = templates.resumeAcknowledgement();
          break;
        case 'aligned':
          buttons = PROGRAM_BUTTONS;
          break;
        case 'tool': {
          refresh = true;
          const result = await this.deps.tools.dispatch(
            { userId, assistantName: this.assistantName(state) },
            { name: command.name, argument: command.argument }
          );
          const output = this.unwrap(userId, result);
          if (output) toolOutput.push(output);
          break;
        }
      }
    }

    let activeTasks: UserTaskView[] | undefined;
    let phase = state.onboardingPhase;
    if (refresh) {
      phase = (await this.deps.engagement.setActive(userId)).onboardingPhase;
      activeTasks = await this.deps.assignments.refreshActiveTasks(userId);
    }

    const message = [parsed.text || acknowledgement, ...toolOutput]
      .filter((part): part is string => Boolean(part))
      .join('\n\n') || templates.resumeAcknowledgement();

    return this.reply(userId, {
      status: 'success',
      intent: 'buddy_response',
      message,
      buttons,
      activeTasks,
      phase
    });
  }

  private async generalConversation(state: EngagementState, text: string, history: string): Promise<TurnResponse> {
    const { userId } = state;
    const [preferences, activeTasks] = await Promise.all([
      this.deps.preferences.getPreferences(userId),
      this.deps.assignments.listActiveTasks(userId)
    ]);

    const prompt = await this.deps.prompts.render('general_conversation', {
      assistant_name: this.assistantName(state),
      user_message: text,
      history,
      preferences: preferences.join(', ') || 'none',
      active_tasks: taskLines(activeTasks)
    });
    const parsed = parseControlTags(await this.deps.oracle.complete(prompt));

    const aligned = parsed.commands.some(c => c.kind === 'aligned');
    const leftover = parsed.commands.filter(c => c.kind !== 'aligned');
    if (leftover.length > 0 || parsed.ignored.length > 0) {
      this.logFor(userId).warn('Dropped control tags outside a buddy response', {
        commands: leftover.map(c => c.kind),
        tags: parsed.ignored
      });
    }

    return this.reply(userId, {
      status: 'success',
      intent: 'general_conversation',
      message: parsed.text || templates.resumeAcknowledgement(),
      buttons: aligned ? PROGRAM_BUTTONS : undefined,
      phase: state.onboardingPhase
    });
  }

  /**
   * Unassigned tasks from the user's assigned projects, one per line.
   */
  private async availableTasks(userId: string): Promise<string> {
    const assigned = await this.deps.catalog.getAssignedProjects(userId);
    const board = await this.deps.assignments.listUserTasks(userId);
    const taken = new Set([...board.active, ...board.pending, ...board.completed].map(t => t.taskId));

    const lines: string[] = [];
    for (const { projectId } of assigned) {
      const project = await this.deps.catalog.getProject(projectId);
      for (const task of await this.deps.catalog.listProjectTasks(projectId)) {
        if (!taken.has(task.id)) {
          lines.push(`- id: ${task.id} | title: ${task.title} | skill: ${task.skillType} | project: ${project.name}`);
        }
      }
    }
    return lines.join('\n');
  }

  private async history(userId: string): Promise<string> {
    const turns = await this.deps.chatRepo.recent(userId, this.deps.options.historyWindow);
    return turns.map(t => `${t.role === 'user' ? 'User' : 'Assistant'}: ${t.text}`).join('\n');
  }

  private assistantName(state: EngagementState): string {
    return state.assistantName ?? this.deps.options.assistantDefaultName;
  }

  private unwrap<T>(userId: string, result: ParseResult<T>): T {
    if (result.kind === 'fallback') {
      this.logFor(userId).warn(`Using fallback: ${result.reason.message}`, { raw: result.reason.raw });
    }
    return result.value;
  }

  private async reply(userId: string, response: TurnResponse): Promise<TurnResponse> {
    if (response.message) {
      await this.appendTurn(userId, 'assistant', response.message);
    }
    return response;
  }

  /**
   * Record an outbound message and push it through the channel.
   * Delivery failures are logged, never retried.
   */
  private async deliver(userId: string, message: string, buttons: QuickReplyButton[]): Promise<void> {
    await this.appendTurn(userId, 'assistant', message);

    let delivered = true;
    try {
      await this.deps.notifier.send(userId, message, buttons);
    } catch (err) {
      delivered = false;
      this.logFor(userId).error('Outbound delivery failed', toError(err));
    }

    await this.deps.eventBus.emit('notify:nudge_sent', { userId, message, buttons, delivered });
  }

  private async appendTurn(userId: string, role: SpeakerRole, text: string): Promise<void> {
    const turn = {
      id: this.deps.idGenerator.generate('turn'),
      role,
      text,
      timestamp: this.clock()
    };
    await this.deps.chatRepo.append(userId, turn);
    await this.deps.eventBus.emit('conversation:turn', { userId, turn });
  }

  private logFor(userId: string): ILogger {
    return this.deps.logger.child({ userId });
  }
}

function preferenceButtons(preferences: string[]): QuickReplyButton[] {
  return preferences.map(p => ({ name: p, callback: p }));
}

function taskLines(tasks: UserTaskView[]): string {
  if (tasks.length === 0) return 'none';
  return tasks.map(t => `- ${t.title} (${t.projectName}, due ${t.expectedCompletionDate ?? 'open'})`).join('\n');
}
