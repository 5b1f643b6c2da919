import { z } from "zod";

export const PRIVILEGE_METHODS = ["sudo", "doas", "pkexec"] as const;
export type PrivilegeMethod = (typeof PRIVILEGE_METHODS)[number];

export const InterpreterEntrySchema = z.object({
  id: z.string().min(1),
  prefix_path: z.string().min(1),
  library_path: z.string().min(1),
  interpreter_path: z.string().min(1),
  version: z.string().regex(/^\d+(\.\d+)*$/, "version must be dotted digits, e.g. 3.11"),
});

/** Full server configuration; every key has a default. */
export const ServerConfigSchema = z.object({
  tool: z
    .object({
      name: z.string().regex(/^[A-Za-z0-9_.-]+$/).default("pip"),
      bootstrap_script: z.string().nullable().default(null),
    })
    .default({}),
  preferences: z
    .object({
      show_output_window_for_installs: z.boolean().default(true),
      elevate_tool_installs: z.boolean().default(false),
    })
    .default({}),
  privilege: z
    .object({
      method: z.enum(PRIVILEGE_METHODS).default("sudo"),
    })
    .default({}),
  interpreters: z.array(InterpreterEntrySchema).default([]),
});

export type InterpreterEntry = z.infer<typeof InterpreterEntrySchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
