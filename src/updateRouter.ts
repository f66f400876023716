// src/updateRouter.ts
import { z } from "zod";
import { AdminResult, AdminService } from "./admin";
import { BrowseResult, BrowsingEngine, ConnectionsResult, LikeResult, ProfileCard } from "./browsing";
import { Messenger } from "./messenger";
import { RegistrationStep, UserId } from "./models";
import { InputResult, RegistrationFlow, RegistrationInput } from "./registration";
import type { InlineKeyboard, TelegramApi } from "./telegramClient";

const fromSchema = z.object({ id: z.number().int() });

const messageSchema = z.object({
  message_id: z.number().int(),
  from: fromSchema.optional(),
  chat: z.object({ id: z.number().int() }),
  text: z.string().optional(),
  photo: z.array(z.object({ file_id: z.string() })).optional(),
});

const callbackQuerySchema = z.object({
  id: z.string(),
  from: fromSchema,
  data: z.string().optional(),
});

export const updateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
  callback_query: callbackQuerySchema.optional(),
});

export type TelegramUpdate = z.infer<typeof updateSchema>;
type IncomingMessage = z.infer<typeof messageSchema>;

const PROMPTS: Record<RegistrationStep, string> = {
  photo: "Step 1/7: send a profile photo.",
  name: "Step 2/7: what is your name?",
  age: "Step 3/7: how old are you? (18+)",
  gender: "Step 4/7: your gender (male/female)?",
  interest: "Step 5/7: who do you want to see (male/female/both)?",
  city: "Step 6/7: which city are you in?",
  bio: "Step 7/7: write a short bio.",
};

const TRY_LATER = "Something went wrong saving your data. Please try again later or contact an admin.";
const REGISTER_FIRST = "Register first with /start.";
const HELP =
  "/start register\n/browse see profiles\n/profile your profile\n/matches your matches\n/likes who liked you\n/cancel stop registration";

export interface RouterDeps {
  registration: RegistrationFlow;
  browsing: BrowsingEngine;
  admin: AdminService;
  messenger: Messenger;
  callbacks: Pick<TelegramApi, "answerCallbackQuery">;
}

function parseId(raw: string | undefined): UserId | undefined {
  return raw && /^\d+$/.test(raw) ? Number(raw) : undefined;
}

export function cardCaption(card: ProfileCard): string {
  return `${card.name}, ${card.age}\n${card.city}\n\n${card.bio}`;
}

export function cardKeyboard(card: ProfileCard): InlineKeyboard {
  if (card.kind === "real") {
    return {
      inline_keyboard: [
        [
          { text: "Like", callback_data: `like:${card.targetId}` },
          { text: "Skip", callback_data: `skip:${card.targetId}` },
        ],
      ],
    };
  }
  return {
    inline_keyboard: [
      [
        { text: "Like (preview)", callback_data: "preview" },
        { text: "Next", callback_data: "next" },
      ],
    ],
  };
}

function adminReply(result: AdminResult): string {
  switch (result.status) {
    case "ok":
      return "Done.";
    case "forbidden":
      return "Admin only.";
    case "not_found":
      return "User not found.";
    case "failed":
      return `Failed (${result.reason}).`;
  }
}

function likeReply(result: LikeResult): string {
  switch (result.status) {
    case "liked":
      return "Liked.";
    case "matched":
      return `It's a match with ${result.targetName}!`;
    case "preview":
      return "Preview only. VIP unlocks real likes; contact an admin to upgrade.";
    case "not_registered":
      return REGISTER_FIRST;
    case "invalid_target":
      return "You cannot like yourself.";
    case "target_not_found":
      return "That profile no longer exists.";
    case "failed":
      return TRY_LATER;
  }
}

function connectionsReply(result: ConnectionsResult, title: string, none: string): string {
  switch (result.status) {
    case "ok":
      return result.people.length === 0
        ? none
        : `${title}\n${result.people.map((p) => p.name).join("\n")}`;
    case "vip_required":
      return "VIP only. Contact an admin to upgrade.";
    case "not_registered":
      return REGISTER_FIRST;
    case "unavailable":
      return TRY_LATER;
  }
}

function inputReply(result: InputResult): string {
  switch (result.status) {
    case "no_session":
      return "Use /start to register.";
    case "unexpected_input":
      return `Not expected right now. ${PROMPTS[result.step]}`;
    case "rejected":
      return `${result.reason} ${PROMPTS[result.step]}`;
    case "advanced":
      return PROMPTS[result.step];
    case "completed":
      return "Registration complete! Send /browse to see profiles.";
    case "save_failed":
      return `Failed to save your profile. ${TRY_LATER}`;
  }
}

/** Maps Telegram updates onto the registration, browsing and admin operations. */
export class UpdateRouter {
  constructor(private deps: RouterDeps) {}

  async handle(raw: unknown): Promise<void> {
    const parsed = updateSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn("[updateRouter] ignoring malformed update:", parsed.error.message);
      return;
    }

    const update = parsed.data;
    if (update.message) {
      await this.onMessage(update.message);
    } else if (update.callback_query) {
      const { id, from, data } = update.callback_query;
      await this.onCallback(id, from.id, data ?? "");
    }
  }

  private async onMessage(message: IncomingMessage): Promise<void> {
    const userId = message.from?.id ?? message.chat.id;
    const { registration, browsing } = this.deps;

    if (message.photo && message.photo.length > 0) {
      // Telegram lists sizes smallest first.
      const fileId = message.photo[message.photo.length - 1].file_id;
      if (registration.currentStep(userId) === undefined) {
        const updated = await registration.updatePhoto(userId, fileId);
        const text =
          updated.status === "updated"
            ? "Profile photo updated."
            : updated.status === "not_registered"
              ? "Unexpected photo. Use /start to register."
              : TRY_LATER;
        return this.reply(userId, text);
      }
      return this.feed(userId, { kind: "photo", fileId });
    }

    const text = message.text?.trim();
    if (!text) return;

    if (!text.startsWith("/")) {
      return this.feed(userId, { kind: "text", text });
    }

    const [head, ...rest] = text.split(/\s+/);
    const command = head.slice(1).split("@")[0].toLowerCase();
    const args = text.slice(head.length).trim();

    switch (command) {
      case "start": {
        const started = await registration.start(userId);
        if (started.status === "already_registered") {
          return this.reply(userId, `Welcome back, ${started.record.name}! Send /browse to see profiles.`);
        }
        return this.reply(userId, started.status === "started" ? PROMPTS.photo : TRY_LATER);
      }
      case "cancel":
        return this.reply(
          userId,
          registration.cancel(userId) ? "Registration cancelled." : "Nothing to cancel."
        );
      case "browse":
        return this.showNext(userId);
      case "profile":
        return this.showOwnProfile(userId);
      case "matches":
        return this.reply(
          userId,
          connectionsReply(await browsing.matches(userId), "Your matches:", "No matches yet.")
        );
      case "likes":
        return this.reply(
          userId,
          connectionsReply(await browsing.likedBy(userId), "People who liked you:", "No one liked you yet.")
        );
      case "help":
        return this.reply(userId, HELP);
      case "init_db":
        return this.reply(userId, adminReply(await this.deps.admin.init(userId)));
      case "grant_vip":
      case "revoke_vip":
      case "delete_user":
        return this.adminTargetCommand(userId, command, rest[0]);
      case "broadcast": {
        const result = await this.deps.admin.broadcast(userId, args);
        const text =
          result.status === "ok"
            ? `Broadcast sent to ${result.delivered} of ${result.attempted} users.`
            : result.status === "forbidden"
              ? "Admin only."
              : result.status === "invalid"
                ? "Usage: /broadcast <message>"
                : TRY_LATER;
        return this.reply(userId, text);
      }
      default:
        return this.reply(userId, HELP);
    }
  }

  private async adminTargetCommand(
    actorId: UserId,
    command: "grant_vip" | "revoke_vip" | "delete_user",
    rawTarget: string | undefined
  ): Promise<void> {
    const targetId = parseId(rawTarget);
    if (targetId === undefined) {
      return this.reply(actorId, `Usage: /${command} <user id>`);
    }

    const { admin } = this.deps;
    const result =
      command === "delete_user"
        ? await admin.deleteUser(actorId, targetId)
        : await admin.setVip(actorId, targetId, command === "grant_vip");
    return this.reply(actorId, adminReply(result));
  }

  private async onCallback(callbackId: string, userId: UserId, data: string): Promise<void> {
    const { browsing, callbacks } = this.deps;
    const [action, rawTarget] = data.split(":");
    const targetId = parseId(rawTarget);

    if (action === "like" && targetId !== undefined) {
      const result = await browsing.like(userId, targetId);
      await callbacks.answerCallbackQuery(callbackId, likeReply(result));
      return;
    }

    if (action === "skip" && targetId !== undefined) {
      const result = await browsing.skip(userId, targetId);
      await callbacks.answerCallbackQuery(
        callbackId,
        result.status === "skipped" ? "Skipped." : undefined
      );
      return this.showNext(userId);
    }

    if (action === "preview") {
      // Decoy cards carry no id; nothing is recorded.
      await callbacks.answerCallbackQuery(callbackId, likeReply({ status: "preview" }));
      return;
    }

    if (action === "next") {
      await callbacks.answerCallbackQuery(callbackId);
      return this.showNext(userId);
    }

    await callbacks.answerCallbackQuery(callbackId);
  }

  private async feed(userId: UserId, input: RegistrationInput): Promise<void> {
    const result = await this.deps.registration.handleInput(userId, input);
    return this.reply(userId, inputReply(result));
  }

  private async showNext(userId: UserId): Promise<void> {
    const result: BrowseResult = await this.deps.browsing.browse(userId);
    switch (result.status) {
      case "shown":
        return this.sendCard(userId, result.card);
      case "empty":
        return this.reply(userId, "No profiles available right now.");
      case "not_registered":
        return this.reply(userId, REGISTER_FIRST);
      case "unavailable":
        return this.reply(userId, TRY_LATER);
    }
  }

  private async showOwnProfile(userId: UserId): Promise<void> {
    const result = await this.deps.browsing.profile(userId);
    if (result.status !== "ok") {
      return this.reply(userId, result.status === "not_registered" ? REGISTER_FIRST : TRY_LATER);
    }

    const { record } = result;
    const caption = `${record.name}, ${record.age}\n${record.city}\n\n${record.bio}\n\nVIP: ${record.vip ? "yes" : "no"}\nCoins: ${record.coins}`;
    await this.sendPhotoOrText(userId, record.photo_file_id, caption);
  }

  private async sendCard(userId: UserId, card: ProfileCard): Promise<void> {
    await this.sendPhotoOrText(userId, card.photo, cardCaption(card), cardKeyboard(card));
  }

  private async sendPhotoOrText(
    userId: UserId,
    photo: string | undefined,
    caption: string,
    keyboard?: InlineKeyboard
  ): Promise<void> {
    const { messenger } = this.deps;
    if (photo) {
      try {
        await messenger.sendPhoto(userId, photo, caption, keyboard);
        return;
      } catch (err) {
        console.warn("[updateRouter] photo send failed, falling back to text:", err);
      }
    }
    await messenger.sendText(userId, caption, keyboard);
  }

  private reply(userId: UserId, text: string): Promise<void> {
    return this.deps.messenger.sendText(userId, text);
  }
}
