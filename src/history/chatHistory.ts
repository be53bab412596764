import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { scopedLogger } from "../utils/logger";

const HISTORY_FILENAME = "chat_history.json";

const chatMessageSchema = z.object({
    id: z.string(),
    timestamp: z.string(),
    question: z.string(),
    answer: z.string(),
    sources: z.array(z.string()).default([]),
});

const historyFileSchema = z.array(chatMessageSchema);

export type ChatMessage = z.infer<typeof chatMessageSchema>;

export interface ChatHistoryStats {
    totalMessages: number;
    oldestMessage: string | null;
    newestMessage: string | null;
}

export interface ChatHistoryOptions {
    storageDir: string;
    maxMessages?: number;
    logger?: Logger;
    now?: () => Date;
}

/**
 * Question/answer log kept in `chat_history.json`. Only the newest `maxMessages` entries
 * are kept. Every operation runs through one queue so concurrent writers never interleave
 * a read-modify-write.
 */
export class ChatHistoryStore {
    readonly filePath: string;

    private readonly maxMessages: number;
    private readonly logger: Logger;
    private readonly now: () => Date;
    private tail: Promise<void> = Promise.resolve();

    constructor(options: ChatHistoryOptions) {
        this.filePath = path.join(options.storageDir, HISTORY_FILENAME);
        this.maxMessages = Math.max(1, options.maxMessages ?? 50);
        this.logger = scopedLogger(options.logger, { module: "chat-history" });
        this.now = options.now ?? (() => new Date());
    }

    addMessage(question: string, answer: string, sources: string[] = []): Promise<ChatMessage> {
        return this.enqueue(async () => {
            const timestamp = this.now();
            const message: ChatMessage = {
                id: `msg_${timestamp.getTime()}_${uuidv4().slice(0, 8)}`,
                timestamp: timestamp.toISOString(),
                question,
                answer,
                sources,
            };

            const history = [...(await this.load()), message].slice(-this.maxMessages);
            await this.save(history);
            this.logger.info({ id: message.id }, "Added message to history.");
            return message;
        });
    }

    getHistory(limit = 20): Promise<ChatMessage[]> {
        return this.enqueue(async () => {
            const history = await this.load();
            return limit > 0 ? history.slice(-limit) : history;
        });
    }

    getMessage(id: string): Promise<ChatMessage | null> {
        return this.enqueue(async () => {
            const history = await this.load();
            return history.find((message) => message.id === id) ?? null;
        });
    }

    /** Resolves `false` when no message has that id. */
    deleteMessage(id: string): Promise<boolean> {
        return this.enqueue(async () => {
            const history = await this.load();
            const remaining = history.filter((message) => message.id !== id);
            if (remaining.length === history.length) {
                return false;
            }
            await this.save(remaining);
            this.logger.info({ id }, "Deleted message.");
            return true;
        });
    }

    clearHistory(): Promise<void> {
        return this.enqueue(async () => {
            await this.save([]);
            this.logger.info("Chat history cleared.");
        });
    }

    getStats(): Promise<ChatHistoryStats> {
        return this.enqueue(async () => {
            const history = await this.load();
            return {
                totalMessages: history.length,
                oldestMessage: history.at(0)?.timestamp ?? null,
                newestMessage: history.at(-1)?.timestamp ?? null,
            };
        });
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.tail.then(task);
        this.tail = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    private async load(): Promise<ChatMessage[]> {
        let raw: string;
        try {
            raw = await readFile(this.filePath, "utf8");
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === "ENOENT") {
                return [];
            }
            throw error;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            this.logger.error({ err: error, file: this.filePath }, "Chat history file is not valid JSON; starting empty.");
            return [];
        }

        const result = historyFileSchema.safeParse(parsed);
        if (!result.success) {
            this.logger.error({ issues: result.error.issues, file: this.filePath }, "Chat history file has an unexpected shape; starting empty.");
            return [];
        }
        return result.data;
    }

    private async save(history: ChatMessage[]): Promise<void> {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        const tempPath = `${this.filePath}.tmp`;
        await writeFile(tempPath, `${JSON.stringify(history, null, 2)}\n`, "utf8");
        await rename(tempPath, this.filePath);
    }
}
