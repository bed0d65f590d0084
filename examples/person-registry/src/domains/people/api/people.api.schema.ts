import { z } from "zod/mini"

export const registerPersonRequestSchema = z.object({
  name: z.string(),
  age: z.number().check(z.int()),
})

export type RegisterPersonRequest = z.infer<typeof registerPersonRequestSchema>

export const renamePersonRequestSchema = z.object({
  name: z.string(),
})

export type RenamePersonRequest = z.infer<typeof renamePersonRequestSchema>
