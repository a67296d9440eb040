import { Response, NextFunction } from 'express';
import config from '../config/index.js';
import type { ChatEvent } from '../middleware/chatValidation.js';
import { AppContext, BodyRequest } from '../types/index.js';
import { AppError } from '../utils/AppError.js';
import { resolveAddress, type Coordinates } from '../utils/geocoder.js';
import { lookupSweepInfo } from '../utils/sweepLookup.js';

/* ------------------------------------------------------------------ */
/*  Constants                                                         */
/* ------------------------------------------------------------------ */

export const HELP_TEXT =
  '🧹 *LA Street Sweeping Bot*\n\n' +
  "Send me an address and I'll tell you the street sweeping schedule.\n\n" +
  '*Look up:*\n' +
  '• `/sweep 1234 Main St, Los Angeles`\n' +
  '• Just type an address\n' +
  '• Or share your 📍 location!\n\n' +
  'Data from City of LA StreetsLA via ArcGIS.';

export const SWEEP_USAGE =
  'Please provide an address.\nExample: `/sweep 1234 Main St, Los Angeles`';

export const ADDRESS_PROMPT =
  'Send me a street address to look up sweeping.\nExample: `1234 Main St, Los Angeles`';

/* ------------------------------------------------------------------ */
/*  Types                                                             */
/* ------------------------------------------------------------------ */

export interface ChatReply {
  /** Markdown text to send back */
  reply: string;
  /** Whether a sweep route was found */
  found: boolean;
}

/* ------------------------------------------------------------------ */
/*  Helpers                                                           */
/* ------------------------------------------------------------------ */

/** Strip control characters and surrounding whitespace. */
function sanitise(input: string): string {
  return input
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .trim();
}

/** Turn operational failures into a reply; anything else propagates. */
async function replyOnError(run: () => Promise<ChatReply>): Promise<ChatReply> {
  try {
    return await run();
  } catch (err: unknown) {
    if (err instanceof AppError && err.isOperational) {
      return { reply: `❌ ${err.message}`, found: false };
    }
    throw err;
  }
}

async function replyForCoords(
  point: Coordinates,
  label: string,
  ctx: AppContext,
): Promise<ChatReply> {
  const result = await lookupSweepInfo(point, {
    today: ctx.today(),
    holidays: ctx.holidays,
  });

  if (!result.found) {
    return {
      reply: `📍 *${label}*\n\n${result.text}\n\n[Check the map](${config.sweepMapUrl})`,
      found: false,
    };
  }

  return {
    reply: `📍 *${label}*\n${result.text}\n\n[View on LA Map](${config.sweepMapUrl})`,
    found: true,
  };
}

async function replyForAddress(address: string, ctx: AppContext): Promise<ChatReply> {
  const geo = await resolveAddress(address);
  return replyForCoords(geo, geo.matchAddress, ctx);
}

/* ------------------------------------------------------------------ */
/*  Event handling                                                    */
/* ------------------------------------------------------------------ */

/**
 * Produce the reply for one chat event.
 *
 *   location pin          → route lookup at the pin
 *   /start, /help         → help text
 *   /sweep <address>      → address lookup
 *   text with a digit     → address lookup
 *   anything else         → prompt for an address
 */
export async function handleChatEvent(event: ChatEvent, ctx: AppContext): Promise<ChatReply> {
  if (event.location) {
    const { latitude, longitude } = event.location;
    return replyOnError(() =>
      replyForCoords(
        { x: longitude, y: latitude },
        `${latitude.toFixed(5)}, ${longitude.toFixed(5)}`,
        ctx,
      ),
    );
  }

  const text = sanitise(event.text ?? '');
  if (!text) {
    return { reply: ADDRESS_PROMPT, found: false };
  }

  if (text.startsWith('/')) {
    const [command, ...args] = text.split(/\s+/);
    // "/sweep@SomeBot" in group chats
    const name = command.slice(1).split('@')[0].toLowerCase();
    if (name === 'sweep') {
      const address = args.join(' ');
      if (!address) {
        return { reply: SWEEP_USAGE, found: false };
      }
      return replyOnError(() => replyForAddress(address, ctx));
    }
    return { reply: HELP_TEXT, found: false };
  }

  if (/\d/.test(text)) {
    return replyOnError(() => replyForAddress(text, ctx));
  }
  return { reply: ADDRESS_PROMPT, found: false };
}

/* ------------------------------------------------------------------ */
/*  Controller                                                        */
/* ------------------------------------------------------------------ */

/**
 * POST /api/chat
 * Body: { text } or { location: { latitude, longitude } }
 */
export function createChatController(ctx: AppContext) {
  return async (
    req: BodyRequest<ChatEvent>,
    res: Response,
    next: NextFunction,
  ): Promise<void> => {
    try {
      const reply = await handleChatEvent(req.body, ctx);
      res.json({ success: true, data: reply });
    } catch (error) {
      next(error);
    }
  };
}
