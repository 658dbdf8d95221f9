export type ErrorCode =
  | 'bad_request'
  | 'unauthorized'
  | 'user_not_found'
  | 'room_not_found'
  | 'achievement_not_found'
  | 'unknown_game_type'
  | 'invalid_bet'
  | 'insufficient_balance'
  | 'active_room_exists'
  | 'room_not_joinable'
  | 'room_not_playing'
  | 'room_full'
  | 'already_joined'
  | 'not_room_creator'
  | 'not_enough_players'
  | 'action_rejected'
  | 'invalid_transition'
  | 'already_checked_in'
  | 'conflict';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  bad_request: 400,
  unauthorized: 401,
  user_not_found: 404,
  room_not_found: 404,
  achievement_not_found: 404,
  unknown_game_type: 404,
  invalid_bet: 400,
  insufficient_balance: 400,
  active_room_exists: 409,
  room_not_joinable: 409,
  room_not_playing: 409,
  room_full: 409,
  already_joined: 409,
  not_room_creator: 403,
  not_enough_players: 409,
  action_rejected: 422,
  invalid_transition: 409,
  already_checked_in: 409,
  conflict: 409,
};

/** Expected failure with a stable code; the HTTP layer turns it into `{ message, code }`. */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
