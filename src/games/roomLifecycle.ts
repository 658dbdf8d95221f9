import type { RoomStatus } from '../models/gameRoom.js';
import type { RoomPlayer } from './types.js';
import { AppError } from '../utils/errors.js';

// Forward only; finished and cancelled are terminal
const TRANSITIONS: Record<RoomStatus, readonly RoomStatus[]> = {
  waiting: ['playing', 'cancelled'],
  playing: ['finished'],
  finished: [],
  cancelled: [],
};

export function canTransition(from: RoomStatus, to: RoomStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: RoomStatus, to: RoomStatus) {
  if (!canTransition(from, to)) {
    throw new AppError('invalid_transition', `Cannot move a ${from} room to ${to}`);
  }
}

// A user may sit in at most one room in these states
export const ACTIVE_STATUSES: readonly RoomStatus[] = ['waiting', 'playing'];

export function isSeated(players: readonly RoomPlayer[], userId: string): boolean {
  return players.some(p => p.user_id === userId);
}
