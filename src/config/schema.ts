import { z } from "zod";

const targetConfigSchema = z.object({
  domain: z.string().min(1).default("arxiv.org"),
  abstractPath: z.string().min(1).default("abs"),
  filePath: z.string().min(1).default("pdf"),
  fileExtension: z.string().startsWith(".").default(".pdf"),
});

export const appConfigSchema = z.object({
  feed: z
    .object({
      maxItems: z.number().int().positive().default(50),
    })
    .default({}),
  target: targetConfigSchema.default({}),
  store: z
    .object({
      cacheDir: z.string().min(1).default("./cache"),
      cacheFile: z.string().min(1).optional(),
      format: z.enum(["json", "sqlite"]).default("json"),
    })
    .default({}),
  artifacts: z.object({
    dir: z.string().min(1),
  }),
  http: z
    .object({
      timeoutMs: z.number().int().positive().default(30000),
      userAgent: z
        .string()
        .min(1)
        .default("paper-harvest/1.0 (favorites harvester)"),
    })
    .default({}),
  schedule: z.string().min(1).optional(),
});

export const credentialsSchema = z.object({
  TWITTER_CONSUMER_KEY: z.string().min(1),
  TWITTER_CONSUMER_SECRET: z.string().min(1),
  TWITTER_ACCESS_TOKEN: z.string().min(1),
  TWITTER_ACCESS_TOKEN_SECRET: z.string().min(1),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type TargetConfig = z.infer<typeof targetConfigSchema>;

export type FeedCredentials = {
  readonly consumerKey: string;
  readonly consumerSecret: string;
  readonly accessToken: string;
  readonly accessTokenSecret: string;
};
