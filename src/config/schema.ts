import { z } from "zod";
import { API_PROVIDERS } from "../providers/runtime.js";

const positiveMs = z.number().int().positive();

const waitsSchema = z
  .object({
    responseTimeoutMs: positiveMs.optional(),
    responseWaitTextMs: z.number().int().min(0).optional(),
    responseWaitImageMs: z.number().int().min(0).optional(),
    uploadDelayMs: z.number().int().min(0).optional(),
  })
  .strict()
  .default({});

const selectorsSchema = z
  .object({
    input: z.string().trim().min(1),
    submit: z.string().trim().min(1).optional(),
    response: z.string().trim().min(1),
    upload: z.string().trim().min(1).optional(),
    authenticated: z.string().trim().min(1),
    login: z.string().trim().min(1).optional(),
  })
  .strict();

const mappingBaseShape = {
  textModel: z.string().trim().optional(),
  visionModel: z.string().trim().optional(),
  textPromptTemplate: z.string().default("{message}"),
  imagePromptTemplate: z.string().default("Describe this image briefly."),
  systemPrompt: z.string().default(""),
  historyTurns: z.number().int().min(0).max(50).default(0),
  maxPromptChars: z.number().int().min(16).optional(),
  waits: waitsSchema,
  enabled: z.boolean().default(true),
};

const uiMappingSchema = z
  .object({
    transport: z.literal("ui"),
    provider: z.string().trim().min(1),
    url: z.string().url(),
    selectors: selectorsSchema,
    reloadAfterResponse: z.boolean().default(true),
    ...mappingBaseShape,
  })
  .strict();

const apiMappingSchema = z
  .object({
    transport: z.literal("api"),
    provider: z.enum(API_PROVIDERS),
    baseUrl: z.string().url().optional(),
    ...mappingBaseShape,
  })
  .strict();

export const conversationMappingSchema = z.discriminatedUnion("transport", [uiMappingSchema, apiMappingSchema]);

export const configFileSchema = z
  .object({
    messagingUrl: z.string().url().default("https://web.whatsapp.com/"),
    ignore: z.array(z.string().trim().min(1)).default([]),
    cacheFile: z.string().trim().min(1).optional(),
    imageDir: z.string().trim().min(1).optional(),
    browserProfileDir: z.string().trim().min(1).optional(),
    conversations: z.record(z.string().min(1), conversationMappingSchema),
  })
  .strict()
  .refine((value) => Object.keys(value.conversations).length > 0, {
    message: "at least one conversation must be configured",
    path: ["conversations"],
  });

export type ConfigFile = z.infer<typeof configFileSchema>;
export type ConversationMappingInput = z.infer<typeof conversationMappingSchema>;
