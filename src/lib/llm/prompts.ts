/**
 * Prompt templates for insurance product Q&A.
 *
 * Answers are written in European Portuguese, grounded only in the
 * retrieved passages, and always cite document title and page.
 */

import { CONTEXT_TRUNCATION_MARKER } from '@/lib/rag/config';

/**
 * Passage fields a prompt needs.
 */
export interface PromptPassage {
  title: string;
  page: number;
  section: string;
  text: string;
}

// =============================================================================
// System Prompt
// =============================================================================

/**
 * Build the system prompt for RAG Q&A.
 * Restricts the model to the supplied context and fixes the answer layout.
 */
export function buildRAGSystemPrompt(): string {
  return `És um assistente especializado em produtos de seguro.

Regras importantes:
1. Responde APENAS com base nas fontes fornecidas no contexto
2. Se a pergunta estiver fora do âmbito de produtos de seguro, indica que não sabes
3. Inclui SEMPRE citações das fontes (título e página)
4. Evita linguagem especulativa e não inventes informação
5. Se não encontrares resposta no contexto, diz claramente que não tens essa informação

Formato da resposta:
## Resposta
[Tua resposta aqui]

## Fontes
• [Título do documento] (p. [número])
• [Título do documento] (p. [número])
`;
}

// =============================================================================
// Context
// =============================================================================

/**
 * Header line that introduces one passage in the context block.
 */
export function formatSourceHeader(passage: PromptPassage, position: number): string {
  const section = passage.section ? ` - ${passage.section}` : '';
  return `\n--- Fonte ${position}: ${passage.title} (Página ${passage.page})${section} ---\n`;
}

/**
 * Concatenate passages, numbered from 1, into the context block.
 * A block longer than maxChars is cut and ends with the truncation marker.
 */
export function buildContext(passages: PromptPassage[], maxChars: number): string {
  const context = passages
    .map((passage, i) => formatSourceHeader(passage, i + 1) + passage.text)
    .join('\n');

  if (context.length > maxChars) {
    return context.slice(0, maxChars) + CONTEXT_TRUNCATION_MARKER;
  }
  return context;
}

// =============================================================================
// User Prompt
// =============================================================================

/**
 * Build the user prompt with context and question.
 */
export function buildRAGUserPrompt(query: string, context: string): string {
  return `Com base no seguinte contexto de documentos de produtos de seguro, responde à pergunta do utilizador.

CONTEXTO:
${context}

PERGUNTA: ${query}

Responde de forma clara e estruturada, citando sempre as fontes.`;
}
