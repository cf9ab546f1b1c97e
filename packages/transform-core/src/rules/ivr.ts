/**
 * IVR key and action mapping
 *
 * Action codes are two-tier: a few actions mean the same thing for every
 * target, the rest depend on what the key routes to.
 */

import type { IvrTargetType } from '@callbridge/core';
import { getLogger } from '@callbridge/core';

const log = getLogger('rules.ivr');

export const DISABLED_ACTION = -1;

/** Action codes that never carry a routing target */
export const ACTIONS_WITHOUT_TARGET: ReadonlySet<number> = new Set([-1, 21, 22, 23]);

const KEY_MAPPINGS: Readonly<Record<string, string>> = {
  Star: '*',
  Hash: '#',
  NoInput: 'timeout',
};

const DIALPAD_KEY_MAPPINGS: Readonly<Record<string, string>> = {
  star: '*',
  hash: '#',
  pound: '#',
};

const UNIVERSAL_ACTIONS: Readonly<Record<string, number>> = {
  Repeat: 21,
  ReturnToRoot: 22,
  ReturnToPrevious: 23,
  ReturnToTopLevelMenu: 22,
  Disconnect: -1,
  DoNothing: -1,
};

const TARGETED_ACTIONS: Readonly<Record<IvrTargetType, Readonly<Record<string, number>>>> = {
  user: {
    Connect: 2,
    Voicemail: 200,
    Transfer: 10,
    ConnectToOperator: 2,
    DialByName: 4,
  },
  call_queue: {
    Connect: 7,
    Voicemail: 400,
    Transfer: 10,
    ConnectToOperator: 7,
    DialByName: 4,
  },
  auto_receptionist: {
    Connect: 8,
    Voicemail: 300,
    Transfer: 10,
    ConnectToOperator: 8,
    DialByName: 4,
  },
};

export function isIvrTargetType(value: unknown): value is IvrTargetType {
  return value === 'user' || value === 'call_queue' || value === 'auto_receptionist';
}

/** `Star`, `Hash` and `NoInput` to `*`, `#` and `timeout`; digits unchanged. */
export function mapIvrKey(key: string): string {
  return KEY_MAPPINGS[key] ?? key;
}

export function mapDialpadIvrKey(key: string): string {
  return DIALPAD_KEY_MAPPINGS[key.toLowerCase()] ?? key;
}

/**
 * Source action name to the target's integer action code for the given
 * target type. Unknown combinations return -1 (disabled).
 */
export function mapIvrAction(action: string, targetType: string): number {
  const universal = UNIVERSAL_ACTIONS[action];
  if (universal !== undefined) return universal;

  if (!isIvrTargetType(targetType)) {
    log.warn('Unknown IVR target type, action disabled', { action, targetType });
    return DISABLED_ACTION;
  }

  const code = TARGETED_ACTIONS[targetType][action];
  if (code === undefined) {
    log.warn('Unknown IVR action, action disabled', { action, targetType });
    return DISABLED_ACTION;
  }
  return code;
}

export function actionTakesTarget(code: number): boolean {
  return !ACTIONS_WITHOUT_TARGET.has(code);
}

const QUEUE_KEYWORDS = ['queue', 'support', 'sales', 'service', 'help', 'department', 'team', 'pso'];
const RECEPTIONIST_KEYWORDS = ['receptionist', 'menu', 'main', 'ivr', 'auto', 'greeting'];

export interface TargetTypeKeywords {
  queue?: readonly string[];
  receptionist?: readonly string[];
}

/**
 * Best-effort guess of what an extension is from its display name. Queue
 * keywords are checked before receptionist keywords; anything else is a
 * user. Not authoritative: a user named "Sales Lead" reads as a queue.
 */
export function inferTargetTypeFromName(
  name: string | null,
  keywords: TargetTypeKeywords = {}
): IvrTargetType {
  if (!name) return 'user';
  const lower = name.toLowerCase();
  if ((keywords.queue ?? QUEUE_KEYWORDS).some((k) => lower.includes(k))) return 'call_queue';
  if ((keywords.receptionist ?? RECEPTIONIST_KEYWORDS).some((k) => lower.includes(k))) {
    return 'auto_receptionist';
  }
  return 'user';
}

/**
 * Dialpad DTMF options carry the routing kind in `action` and
 * `action_target_type`; departments are queues, offices are auto
 * receptionists, everything else is a user.
 */
export function dialpadTargetType(action: string, actionTargetType: string): IvrTargetType {
  if (action === 'department' || actionTargetType === 'department') return 'call_queue';
  if (action === 'operator') return 'user';
  if (actionTargetType === 'office') return 'auto_receptionist';
  return 'user';
}

const DIALPAD_VOICEMAIL_ACTIONS: Readonly<Record<IvrTargetType, number>> = {
  user: 200,
  call_queue: 400,
  auto_receptionist: 300,
};

/** Dialpad DTMF action name to the target's action code; unknown names disable the key. */
export function mapDialpadAction(action: string, targetType: IvrTargetType): number {
  switch (action) {
    case 'operator':
      return 2;
    case 'department':
      return 7;
    case 'voicemail':
      return DIALPAD_VOICEMAIL_ACTIONS[targetType];
    case 'directory':
      return 4;
    case 'repeat':
      return 21;
    case 'disabled':
    case 'disconnect':
      return DISABLED_ACTION;
    default:
      log.warn('Unknown Dialpad IVR action, action disabled', { action });
      return DISABLED_ACTION;
  }
}
