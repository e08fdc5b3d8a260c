import { readFile } from "node:fs/promises";
import { z } from "zod";

import { ValidationError } from "../errors.js";

const toolServerSchema = z
  .object({
    name: z.string().trim().min(1),
    url: z.string().url(),
    /** Tools routed to this server without discovery. */
    tools: z.array(z.string().trim().min(1)).default([]),
    /** Environment variable holding the bearer credential. */
    credentialEnv: z.string().trim().min(1).optional(),
  })
  .strict();

const toolServersFileSchema = z
  .object({
    servers: z.array(toolServerSchema).default([]),
    defaultServer: z.string().trim().min(1).optional(),
  })
  .strict()
  .superRefine((file, ctx) => {
    const names = new Set<string>();
    file.servers.forEach((server, index) => {
      if (names.has(server.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["servers", index, "name"],
          message: `duplicate server name "${server.name}"`,
        });
      }
      names.add(server.name);
    });
    if (file.defaultServer && !names.has(file.defaultServer)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["defaultServer"],
        message: `default server "${file.defaultServer}" is not declared`,
      });
    }
  });

export type ToolServerConfig = z.infer<typeof toolServerSchema>;

/** Validated tool-server configuration with the static routing table. */
export interface ToolServerRegistry {
  servers: ToolServerConfig[];
  defaultServer: string | null;
  /** `tool → server` entries declared in the file. First declaration wins. */
  staticRoutes: Map<string, string>;
}

export function parseToolServerConfig(raw: unknown): ToolServerRegistry {
  const parsed = toolServersFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("invalid tool server configuration", {
      details: { issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) },
    });
  }
  const staticRoutes = new Map<string, string>();
  for (const server of parsed.data.servers) {
    for (const tool of server.tools) {
      if (!staticRoutes.has(tool)) {
        staticRoutes.set(tool, server.name);
      }
    }
  }
  return {
    servers: parsed.data.servers,
    defaultServer: parsed.data.defaultServer ?? null,
    staticRoutes,
  };
}

export async function loadToolServerConfig(path: string): Promise<ToolServerRegistry> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`tool server configuration ${path} is not valid JSON`, { cause: error });
  }
  return parseToolServerConfig(raw);
}

export function emptyToolServerRegistry(): ToolServerRegistry {
  return { servers: [], defaultServer: null, staticRoutes: new Map() };
}
