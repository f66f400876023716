import { AdminService, adminAllowList } from "../src/admin";
import { BrowsingEngine } from "../src/browsing";
import { RegistrationFlow } from "../src/registration";
import { UpdateRouter, cardKeyboard } from "../src/updateRouter";
import { NOW, RecordingMessenger, makeRecord, seededStore, silenceConsole } from "./helpers";

beforeEach(silenceConsole);

const ADMIN = 500;

function setup() {
  const { store } = seededStore([
    makeRecord(1, { name: "Ann", vip: true, interest: "female" }),
    makeRecord(2, { name: "Bea" }),
    makeRecord(3, { name: "Cal", gender: "male", interest: "male" }),
  ]);
  const messenger = new RecordingMessenger();
  const answers: Array<[string, string | undefined]> = [];
  const router = new UpdateRouter({
    registration: new RegistrationFlow(store, { now: () => NOW }),
    browsing: new BrowsingEngine(store, messenger),
    admin: new AdminService(store, messenger, adminAllowList([ADMIN])),
    messenger,
    callbacks: {
      answerCallbackQuery: async (id: string, text?: string) => {
        answers.push([id, text]);
      },
    },
  });
  return { store, messenger, answers, router };
}

let nextUpdateId = 1;

function text(from: number, body: string) {
  return { update_id: nextUpdateId++, message: { message_id: 1, from: { id: from }, chat: { id: from }, text: body } };
}

function photo(from: number, fileId: string) {
  return {
    update_id: nextUpdateId++,
    message: {
      message_id: 1,
      from: { id: from },
      chat: { id: from },
      photo: [{ file_id: `${fileId}-small` }, { file_id: fileId }],
    },
  };
}

function callback(from: number, data: string) {
  return { update_id: nextUpdateId++, callback_query: { id: "cb-1", from: { id: from }, data } };
}

describe("UpdateRouter", () => {
  it("starts registration and takes the largest photo size", async () => {
    const { store, messenger, router } = setup();

    await router.handle(text(42, "/start"));
    await router.handle(photo(42, "photo-big"));
    for (const body of ["Alex", "25", "male", "both", "Paris", "Loves hiking."]) {
      await router.handle(text(42, body));
    }

    expect(messenger.sent[0].text).toBe("Step 1/7: send a profile photo.");
    expect(messenger.sent[1].text).toBe("Step 2/7: what is your name?");
    expect(messenger.sent[messenger.sent.length - 1].text).toBe(
      "Registration complete! Send /browse to see profiles."
    );
    expect((await store.getUser(42))?.photo_file_id).toBe("photo-big");
  });

  it("re-prompts on invalid input", async () => {
    const { messenger, router } = setup();
    await router.handle(text(42, "/start"));
    await router.handle(photo(42, "p"));
    await router.handle(text(42, "Alex"));

    await router.handle(text(42, "17"));

    expect(messenger.sent[messenger.sent.length - 1].text).toBe(
      "You must be at least 18. Step 3/7: how old are you? (18+)"
    );
  });

  it("ignores malformed updates", async () => {
    const { messenger, router } = setup();

    await router.handle({ hello: "world" });

    expect(messenger.sent).toEqual([]);
  });

  it("greets registered users on /start", async () => {
    const { messenger, router } = setup();

    await router.handle(text(2, "/start"));

    expect(messenger.sent).toEqual([
      { to: 2, text: "Welcome back, Bea! Send /browse to see profiles.", keyboard: undefined },
    ]);
  });

  it("shows decoy cards to non-VIP users", async () => {
    const { messenger, router } = setup();

    await router.handle(text(3, "/browse"));

    expect(messenger.sent).toEqual([
      {
        to: 3,
        text: "Rahul, 24\nDelhi\n\nCoffee & coding.",
        photo: "https://picsum.photos/400?random=11",
        keyboard: {
          inline_keyboard: [
            [
              { text: "Like (preview)", callback_data: "preview" },
              { text: "Next", callback_data: "next" },
            ],
          ],
        },
      },
    ]);
  });

  it("shows real cards with like and skip buttons to VIP users", async () => {
    const { messenger, router } = setup();

    await router.handle(text(1, "/browse@match_bot"));

    expect(messenger.sent[0].text).toBe("Bea, 25\nParis\n\nHi.");
    expect(messenger.sent[0].photo).toBe("photo-2");
    expect(messenger.sent[0].keyboard).toEqual(
      cardKeyboard({ kind: "real", targetId: 2, name: "Bea", age: 25, city: "Paris", bio: "Hi." })
    );
  });

  it("answers like callbacks", async () => {
    const { store, answers, router } = setup();

    await router.handle(callback(1, "like:2"));

    expect(answers).toEqual([["cb-1", "Liked."]]);
    expect((await store.getUser(1))?.likes).toEqual(["2"]);
  });

  it("answers preview likes without recording anything", async () => {
    const { store, answers, router } = setup();

    await router.handle(callback(3, "preview"));

    expect(answers).toEqual([["cb-1", "Preview only. VIP unlocks real likes; contact an admin to upgrade."]]);
    expect((await store.getUser(3))?.likes).toEqual([]);
  });

  it("skips a real profile and shows the next one", async () => {
    const { messenger, answers, router } = setup();

    await router.handle(callback(1, "skip:2"));

    expect(answers).toEqual([["cb-1", "Skipped."]]);
    expect(messenger.sent.map((m) => [m.to, m.text])).toEqual([[1, "Bea, 25\nParis\n\nHi."]]);
  });

  it("moves through decoy cards on next", async () => {
    const { messenger, answers, router } = setup();

    await router.handle(callback(3, "next"));
    await router.handle(callback(3, "next"));

    expect(answers).toEqual([
      ["cb-1", undefined],
      ["cb-1", undefined],
    ]);
    expect(messenger.sent.map((m) => m.text)).toEqual([
      "Rahul, 24\nDelhi\n\nCoffee & coding.",
      "Aman, 26\nMumbai\n\nTraveler.",
    ]);
  });

  it("updates the photo of registered users outside registration", async () => {
    const { store, messenger, router } = setup();

    await router.handle(photo(2, "photo-new"));

    expect(messenger.sent[0].text).toBe("Profile photo updated.");
    expect((await store.getUser(2))?.photo_file_id).toBe("photo-new");
  });

  it("keeps admin commands to admins", async () => {
    const { store, messenger, router } = setup();

    await router.handle(text(1, "/grant_vip 2"));
    await router.handle(text(ADMIN, "/grant_vip"));
    await router.handle(text(ADMIN, "/grant_vip 2"));

    expect(messenger.sent.map((m) => m.text)).toEqual([
      "Admin only.",
      "Usage: /grant_vip <user id>",
      "Done.",
    ]);
    expect((await store.getUser(2))?.vip).toBe(true);
  });

  it("broadcasts the text after the command", async () => {
    const { messenger, router } = setup();

    await router.handle(text(ADMIN, "/broadcast Hello everyone"));

    expect(messenger.sent.map((m) => [m.to, m.text])).toEqual([
      [1, "Hello everyone"],
      [2, "Hello everyone"],
      [3, "Hello everyone"],
      [ADMIN, "Broadcast sent to 3 of 3 users."],
    ]);
  });
});
