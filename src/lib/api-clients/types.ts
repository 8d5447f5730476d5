import { z } from 'zod'

const NumericField = z.union([z.number(), z.string()])

export const ProviderQuoteRowSchema = z.object({
  data: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
  preco: NumericField.nullable(),
  variacao_dia: NumericField.nullable().optional(),
  unidade: z.string().optional(),
})

export const ProviderQuotesResponseSchema = z.object({
  cotacoes: z.array(ProviderQuoteRowSchema),
})

export type ProviderQuoteRow = z.infer<typeof ProviderQuoteRowSchema>
export type ProviderQuotesResponse = z.infer<typeof ProviderQuotesResponseSchema>
