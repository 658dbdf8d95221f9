import { customAlphabet } from 'nanoid';

// Short enough to type in a chat command
export const newRoomId = customAlphabet('0123456789abcdef', 8);
