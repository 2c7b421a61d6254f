/**
 * Per-pet, per-date plan. Filters the pet's tasks down to due, applicable
 * candidates, orders them (composite ordering with preference boosts) and
 * admits them greedily within the owner's time budget, respecting
 * dependencies. Holds references only; regenerate whenever inputs change.
 */

import type { Task, TaskId, IsoDate } from '../types/task.js';
import { Priority } from '../types/priority.js';
import type { Owner } from '../model/owner.js';
import type { Pet } from '../model/pet.js';
import { getPriorityValue, isDueOn } from '../model/task-helpers.js';
import { isIsoDate } from '../parsers/date-parser.js';
import { formatTime } from '../parsers/time-parser.js';
import { ValidationError } from '../errors.js';
import { compositeComparator } from './ordering.js';
import type { PriorityScore } from './ordering.js';
import { buildDependencyGraph, hasCircularDependency, unmetDependencies } from './dependencies.js';

const PRIORITY_WEIGHT = 10;
const PREFERRED_TYPE_BOOST = 5;
const PREFERRED_TAG_BOOST = 4;
const SPECIAL_NEEDS_BOOST = 6;

export type AdmissionReason =
  | 'fixed-time'
  | 'high-priority'
  | 'preference-match'
  | 'special-needs'
  | 'fits-budget'
  | 'manual';

export type SkipReason =
  | 'time-budget'
  | 'conflict'
  | 'unmet-dependency'
  | 'missing-dependency'
  | 'circular-dependency'
  | 'max-tasks';

export type ExclusionReason =
  | 'completed'
  | 'not-due'
  | 'not-applicable'
  | 'avoided-type'
  | 'avoided-tag';

export type ExplanationEntry =
  | { readonly kind: 'scheduled'; readonly taskId: TaskId; readonly reasons: readonly AdmissionReason[]; readonly message: string }
  | { readonly kind: 'skipped'; readonly taskId: TaskId; readonly reason: SkipReason; readonly message: string }
  | { readonly kind: 'excluded'; readonly taskId: TaskId; readonly reason: ExclusionReason; readonly message: string }
  | { readonly kind: 'notice'; readonly message: string };

export interface UnscheduledTask {
  readonly task: Task;
  readonly reason: SkipReason | ExclusionReason;
}

export interface ScheduleConflict {
  readonly task: Task;
  readonly conflictsWith: Task;
}

const ADMISSION_LABELS: Record<AdmissionReason, string> = {
  'fixed-time': 'fixed start time',
  'high-priority': 'high priority',
  'preference-match': 'matches owner preferences',
  'special-needs': 'special-needs care',
  'fits-budget': 'fits remaining time',
  'manual': 'added manually',
};

type Admission =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: 'time-budget' }
  | { readonly ok: false; readonly reason: 'conflict'; readonly conflictsWith: Task }
  | { readonly ok: false; readonly reason: 'duplicate' };

function overlaps(a: Task, b: Task): boolean {
  if (a.startTimeMinutes === null || b.startTimeMinutes === null) return false;
  return a.startTimeMinutes < b.startTimeMinutes + b.durationMinutes
    && b.startTimeMinutes < a.startTimeMinutes + a.durationMinutes;
}

function hasAny(values: ReadonlySet<string>, wanted: ReadonlySet<string>): boolean {
  for (const v of values) {
    if (wanted.has(v)) return true;
  }
  return false;
}

export class Schedule {
  readonly date: IsoDate;
  readonly owner: Owner;
  readonly pet: Pet;
  private readonly givenTasks: readonly Task[] | null;
  private scheduled: Task[] = [];
  private conflicts: ScheduleConflict[] = [];
  private unscheduled: UnscheduledTask[] = [];
  private entries: ExplanationEntry[] = [];
  private _totalTimeMinutes = 0;

  constructor(date: IsoDate, owner: Owner, pet: Pet, availableTasks?: readonly Task[]) {
    if (!isIsoDate(date)) throw new ValidationError('schedule date', `expected yyyy-MM-dd, got ${date}`);
    this.date = date;
    this.owner = owner;
    this.pet = pet;
    this.givenTasks = availableTasks ?? null;
  }

  /** The tasks given at construction, otherwise the pet's tasks as they are now */
  get availableTasks(): readonly Task[] {
    return this.givenTasks ?? this.pet.getTasks(true);
  }

  get totalTimeMinutes(): number { return this._totalTimeMinutes; }
  get remainingMinutes(): number { return this.owner.availableTimeMinutes - this._totalTimeMinutes; }

  /** Rebuild the schedule from the current inputs */
  generateSchedule(): void {
    this.scheduled = [];
    this.conflicts = [];
    this.unscheduled = [];
    this.entries = [];
    this._totalTimeMinutes = 0;
    const available = this.availableTasks;

    const exclusions: ExplanationEntry[] = [];
    const candidates: Task[] = [];
    for (const task of available) {
      const excluded = this.exclusionFor(task);
      if (excluded) {
        exclusions.push(excluded);
        this.unscheduled.push({ task, reason: excluded.reason });
      } else {
        candidates.push(task);
      }
    }

    const ordered = [...candidates].sort(compositeComparator(this.priorityScore));
    const satisfied = new Set<TaskId>(available.filter(t => t.completed).map(t => t.id));
    const maxTasks = this.owner.preferences.maxTasks;

    // Fixed point: every pass that makes progress admits at least one task,
    // so this runs at most once per candidate.
    let remaining = ordered;
    let progress = true;
    while (remaining.length > 0 && progress) {
      progress = false;
      const deferred: Task[] = [];

      for (const [i, task] of remaining.entries()) {
        if (unmetDependencies(task, satisfied).length > 0) {
          deferred.push(task);
          continue;
        }

        if (maxTasks !== null && this.scheduled.length >= maxTasks) {
          this.entries.push({ kind: 'notice', message: `Stopped scheduling: reached the owner's limit of ${maxTasks} tasks.` });
          for (const rest of [...deferred, ...remaining.slice(i)]) {
            this.skip(rest, 'max-tasks', `Skipped ${rest.title}: task limit of ${maxTasks} reached.`);
          }
          deferred.length = 0;
          break;
        }

        const admission = this.admit(task);
        if (admission.ok) {
          satisfied.add(task.id);
          progress = true;
          const reasons = this.admissionReasons(task);
          this.entries.push({
            kind: 'scheduled',
            taskId: task.id,
            reasons,
            message: `Scheduled ${task.title}${this.timeSuffix(task)}: ${reasons.map(r => ADMISSION_LABELS[r]).join(', ')}.`,
          });
        } else if (admission.reason === 'conflict') {
          this.skip(task, 'conflict', `Skipped ${task.title}: time conflict with ${admission.conflictsWith.title}.`);
        } else if (admission.reason === 'time-budget') {
          this.skip(
            task,
            'time-budget',
            `Skipped ${task.title}: time budget exceeded (needs ${task.durationMinutes} min, ${this.remainingMinutes} min left).`,
          );
        }
      }

      remaining = deferred;
    }

    this.entries.push(...exclusions);
    this.explainUnresolved(remaining, available);

    if (this.scheduled.length === 0 && this.owner.availableTimeMinutes <= 0) {
      this.entries.push({ kind: 'notice', message: 'No tasks scheduled because available time is zero.' });
    }
  }

  /**
   * Manual override: put a task in the schedule regardless of ordering,
   * preferences and dependencies. The time budget and timed overlaps still apply.
   * A task added this way is no longer reported as skipped or excluded.
   */
  addTaskToSchedule(task: Task): boolean {
    const admission = this.admit(task);
    if (!admission.ok) return false;
    this.unscheduled = this.unscheduled.filter(u => u.task.id !== task.id);
    this.entries = this.entries.filter(e => e.kind === 'notice' || e.kind === 'scheduled' || e.taskId !== task.id);
    this.entries.push({
      kind: 'scheduled',
      taskId: task.id,
      reasons: ['manual'],
      message: `Scheduled ${task.title}${this.timeSuffix(task)}: ${ADMISSION_LABELS.manual}.`,
    });
    return true;
  }

  /** Within the time budget, and no two admitted timed tasks overlap */
  validateSchedule(): boolean {
    if (this.calculateTotalTime() > this.owner.availableTimeMinutes) return false;
    return !this.scheduled.some((a, i) => this.scheduled.slice(i + 1).some(b => overlaps(a, b)));
  }

  getExplanation(): string {
    return this.entries.map(e => e.message).join('\n');
  }

  getExplanationEntries(): readonly ExplanationEntry[] {
    return [...this.entries];
  }

  calculateTotalTime(): number {
    this._totalTimeMinutes = this.scheduled.reduce((sum, t) => sum + t.durationMinutes, 0);
    return this._totalTimeMinutes;
  }

  getScheduledTasks(): Task[] {
    return [...this.scheduled];
  }

  getConflicts(): ScheduleConflict[] {
    return [...this.conflicts];
  }

  getUnscheduled(): UnscheduledTask[] {
    return [...this.unscheduled];
  }

  // --- internals ---

  private readonly priorityScore: PriorityScore = task => {
    const prefs = this.owner.preferences;
    let score = getPriorityValue(task) * PRIORITY_WEIGHT;
    if (prefs.preferredTaskTypes.has(task.taskType)) score += PREFERRED_TYPE_BOOST;
    if (hasAny(task.preferenceTags, prefs.preferredTags)) score += PREFERRED_TAG_BOOST;
    if (task.requiresSpecialNeeds && this.pet.hasSpecialNeeds()) score += SPECIAL_NEEDS_BOOST;
    return score;
  };

  private admit(task: Task): Admission {
    if (this.scheduled.some(t => t.id === task.id)) return { ok: false, reason: 'duplicate' };
    if (this._totalTimeMinutes + task.durationMinutes > this.owner.availableTimeMinutes) {
      return { ok: false, reason: 'time-budget' };
    }
    const clash = this.scheduled.find(t => overlaps(task, t));
    if (clash) {
      this.conflicts.push({ task, conflictsWith: clash });
      return { ok: false, reason: 'conflict', conflictsWith: clash };
    }
    this.scheduled.push(task);
    this._totalTimeMinutes += task.durationMinutes;
    return { ok: true };
  }

  private skip(task: Task, reason: SkipReason, message: string): void {
    this.unscheduled.push({ task, reason });
    this.entries.push({ kind: 'skipped', taskId: task.id, reason, message });
  }

  private exclusionFor(task: Task): Extract<ExplanationEntry, { kind: 'excluded' }> | null {
    const prefs = this.owner.preferences;
    const exclude = (reason: ExclusionReason, why: string) =>
      ({ kind: 'excluded', taskId: task.id, reason, message: `Excluded ${task.title}: ${why}.` }) as const;

    if (task.completed) return exclude('completed', 'already completed');
    if (!isDueOn(task, this.date)) return exclude('not-due', `not due on ${this.date}`);
    if (!this.appliesToPet(task)) return exclude('not-applicable', `not applicable to ${this.pet.name}`);
    if (prefs.avoidTaskTypes.has(task.taskType)) return exclude('avoided-type', `owner avoids ${task.taskType} tasks`);
    const avoidedTag = [...task.preferenceTags].find(tag => prefs.avoidTags.has(tag));
    if (avoidedTag !== undefined) return exclude('avoided-tag', `owner avoids tag ${avoidedTag}`);
    return null;
  }

  private appliesToPet(task: Task): boolean {
    if (task.applicableSpecies.size > 0) {
      const species = this.pet.species.toLowerCase();
      if (![...task.applicableSpecies].some(s => s.toLowerCase() === species)) return false;
    }
    return !task.requiresSpecialNeeds || this.pet.hasSpecialNeeds();
  }

  private admissionReasons(task: Task): AdmissionReason[] {
    const prefs = this.owner.preferences;
    const reasons: AdmissionReason[] = [];
    if (task.startTimeMinutes !== null) reasons.push('fixed-time');
    if (task.priority >= Priority.High) reasons.push('high-priority');
    if (prefs.preferredTaskTypes.has(task.taskType) || hasAny(task.preferenceTags, prefs.preferredTags)) {
      reasons.push('preference-match');
    }
    if (task.requiresSpecialNeeds && this.pet.hasSpecialNeeds()) reasons.push('special-needs');
    if (reasons.length === 0) reasons.push('fits-budget');
    return reasons;
  }

  /** Tasks still waiting on dependencies once no pass makes progress */
  private explainUnresolved(waiting: readonly Task[], available: readonly Task[]): void {
    const availableIds = new Set(available.map(t => t.id));
    const graph = buildDependencyGraph(available);
    const admittedOrDone = new Set([
      ...this.scheduled.map(t => t.id),
      ...available.filter(t => t.completed).map(t => t.id),
    ]);

    for (const task of waiting) {
      const unmet = unmetDependencies(task, admittedOrDone);
      const missing = unmet.filter(id => !availableIds.has(id));
      if (missing.length > 0) {
        this.skip(task, 'missing-dependency', `Skipped ${task.title}: unmet dependency (${missing.join(', ')} not available).`);
      } else if (hasCircularDependency(graph, task.id)) {
        this.skip(task, 'circular-dependency', `Skipped ${task.title}: circular dependency.`);
      } else {
        this.skip(task, 'unmet-dependency', `Skipped ${task.title}: unmet dependency (${unmet.join(', ')} not scheduled).`);
      }
    }
  }

  private timeSuffix(task: Task): string {
    return task.startTimeMinutes === null ? '' : ` at ${formatTime(task.startTimeMinutes)}`;
  }
}
