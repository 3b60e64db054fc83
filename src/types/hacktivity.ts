import { z } from "zod";

// Everything below `nodes` is optional on purpose: a sparse node is
// normalized with placeholders instead of failing the whole window.
export const HacktivityNodeSchema = z.object({
  _id: z.union([z.string(), z.number()]).nullish(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  severity: z.object({ rating: z.string().nullish() }).nullish(),
  team: z.object({ handle: z.string().nullish() }).nullish(),
});

export const HacktivityResponseSchema = z.object({
  data: z
    .object({
      reports: z
        .object({ nodes: z.array(HacktivityNodeSchema).nullish() })
        .nullish(),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string().optional() })).optional(),
});

export type HacktivityNode = z.infer<typeof HacktivityNodeSchema>;
