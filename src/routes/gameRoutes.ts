import { Router } from 'express';
import { z } from 'zod';
import { ROOM_STATUSES } from '../models/gameRoom.js';
import type { GameService } from '../services/gameService.js';
import type { GameRoomState } from '../games/types.js';
import { jsonObjectSchema } from '../utils/json.js';

const actorSchema = z.object({ userId: z.string().min(1) });
const playerSchema = actorSchema.extend({ username: z.string().min(1).max(64) });

export function createGameRouter(games: GameService) {
  const router = Router();

  router.get('/games', (_req, res) => res.json({ games: games.listGames() }));

  router.get('/games/:gameType/rules', (req, res, next) => {
    try {
      res.json({ gameType: req.params.gameType, rules: games.rules(req.params.gameType) });
    } catch (e) { next(e); }
  });

  router.get('/rooms', async (req, res, next) => {
    try {
      const { channelId, gameType, status } = z.object({
        channelId: z.string().min(1),
        gameType: z.string().min(1).optional(),
        status: z.enum(ROOM_STATUSES).optional(),
      }).parse(req.query);
      const rooms = await games.listChannelRooms(channelId, { gameType, status });
      res.json({ rooms: rooms.map(room => ({ ...room, description: games.describeRoom(room) })) });
    } catch (e) { next(e); }
  });

  // Server-Sent Events stream of room changes, optionally for one channel
  router.get('/rooms/stream', async (req, res, next) => {
    let channelId: string | undefined;
    let initial: GameRoomState[] = [];
    try {
      channelId = z.object({ channelId: z.string().min(1).optional() }).parse(req.query).channelId;
      if (channelId) initial = await games.listChannelRooms(channelId);
    } catch (e) { return next(e); }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders?.();

    const send = (event: string, data: unknown) => {
      res.write(`event: ${event}\n`);
      res.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    const listener = (room: GameRoomState) => {
      if (channelId && room.channelId !== channelId) return;
      send('update', { room });
    };
    games.on('update', listener);
    // initial push
    send('snapshot', { rooms: initial });

    req.on('close', () => {
      games.removeListener('update', listener);
    });
  });

  router.get('/rooms/:id', async (req, res, next) => {
    try {
      const room = await games.requireRoom(req.params.id);
      res.json({ room, description: games.describeRoom(room) });
    } catch (e) { next(e); }
  });

  router.post('/rooms', async (req, res, next) => {
    try {
      const body = playerSchema.extend({
        gameType: z.string().min(1),
        channelId: z.string().min(1),
        betAmount: z.coerce.number().int(),
        settings: jsonObjectSchema.optional(),
      }).parse(req.body);
      const room = await games.createRoom({
        gameType: body.gameType,
        channelId: body.channelId,
        creatorId: body.userId,
        creatorName: body.username,
        betAmount: body.betAmount,
        settings: body.settings,
      });
      res.status(201).json({ room, description: games.describeRoom(room) });
    } catch (e) { next(e); }
  });

  router.post('/rooms/:id/join', async (req, res, next) => {
    try {
      const { userId, username } = playerSchema.parse(req.body);
      const result = await games.joinRoom(req.params.id, userId, username);
      res.json(result);
    } catch (e) { next(e); }
  });

  router.post('/rooms/:id/start', async (req, res, next) => {
    try {
      const { userId } = actorSchema.parse(req.body);
      res.json(await games.startRoom(req.params.id, userId));
    } catch (e) { next(e); }
  });

  router.post('/rooms/:id/actions', async (req, res, next) => {
    try {
      const { userId, action, params } = actorSchema.extend({
        action: z.string().min(1),
        params: jsonObjectSchema.default({}),
      }).parse(req.body);
      res.json(await games.recordAction(req.params.id, userId, action, params));
    } catch (e) { next(e); }
  });

  router.post('/rooms/:id/cancel', async (req, res, next) => {
    try {
      const { userId } = actorSchema.parse(req.body);
      const room = await games.cancelRoom(req.params.id, userId);
      res.json({ room });
    } catch (e) { next(e); }
  });

  return router;
}
