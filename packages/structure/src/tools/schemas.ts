import * as z from "zod/v4";

import { EXPORT_FORMATS } from "../core/model.js";

export const ExportFormatSchema = z.enum(EXPORT_FORMATS);

export const VariableSchema = z.object({
  name: z.string(),
  annotation: z.string().optional(),
  value: z.string().optional(),
});

export const FunctionSchema = z.object({
  name: z.string(),
  args: z.array(z.string()),
  docstring: z.string().optional(),
  returnAnnotation: z.string().optional(),
  decorators: z.array(z.string()),
  isAsync: z.boolean(),
});

export const ClassSchema = z.object({
  name: z.string(),
  bases: z.array(z.string()),
  docstring: z.string().optional(),
  decorators: z.array(z.string()),
  attributes: z.array(VariableSchema),
  methods: z.array(FunctionSchema),
});

export const StructureSchema = z.object({
  moduleName: z.string(),
  globalVariables: z.array(VariableSchema),
  functions: z.array(FunctionSchema),
  classes: z.array(ClassSchema),
  imports: z.object({
    direct: z.array(z.string()),
    from: z.array(z.string()),
  }),
  /** Scope id -> sorted callee descriptors */
  calls: z.record(z.string(), z.array(z.string())),
});

export type StructureJson = z.infer<typeof StructureSchema>;

/** Output fields shared by every tool */
export const outputBase = {
  success: z.boolean(),
  error: z.string().optional(),
  kind: z.string().optional(),
};
