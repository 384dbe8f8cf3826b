import type { UnitRecord } from '../graph/schema.js';

// ═══════════════════════════════════════════════════════════════
// UNIT GENERATION
// ═══════════════════════════════════════════════════════════════

const EXAMPLE_NODE = {
  id: 'a1',
  type: 'process',
  phase: 'act',
  description: 'Process with LLM',
  primitive: 'call_llm',
  input: '$input',
  args: { prompt: 'Do something with: {input}' },
  output: '$result',
};

export function generateUnitPrompt(
  intent: string,
  primitives: readonly string[],
  blueprint?: UnitRecord | null,
  notes?: string,
): string {
  const sections = [
    `Create a JSON unit for this intent: "${intent}"`,
    `Requirements:
1. Must have id, type, intent, phases, tension, importance, nodes, edges
2. Each node must have: id, type, phase, description, primitive, args, output
3. Node types: input, process, output
4. Phases: sense, act, feedback
5. Use $variable_name for data flow between nodes
6. Every edge must connect existing node ids`,
    `Available primitives: ${primitives.join(', ')}`,
    `Common patterns:
- Sense phase: get input from context
- Act phase: process with call_llm
- Feedback phase: emit result, optionally learn_from_experience`,
    `Example node:\n${JSON.stringify(EXAMPLE_NODE, null, 2)}`,
  ];

  if (blueprint) {
    sections.push(`Start from this blueprint:\n${JSON.stringify(blueprint, null, 2)}`);
  }
  if (notes) {
    sections.push(notes);
  }
  sections.push('Return ONLY valid JSON, no explanation.');

  return sections.join('\n\n');
}

// ═══════════════════════════════════════════════════════════════
// MEMORY
// ═══════════════════════════════════════════════════════════════

export function relevancePrompt(memoryIntent: string, context: string): string {
  return `Rate 0.0-1.0 how relevant this memory is to the context. Return ONLY a number.

${JSON.stringify({ memory: memoryIntent, context })}`;
}

export function batchRelevancePrompt(context: string, intents: Record<string, string>): string {
  return `Rate each memory's relevance (0.0-1.0) to this context.
Return JSON only: {"0": 0.5, "1": 0.8, ...}

Context: ${context}

Memories:
${JSON.stringify(intents, null, 2)}`;
}

export function learnPrompt(task: string, result: string, success: boolean): string {
  return `You completed a task. Extract a reusable lesson for future similar tasks.

TASK: ${task}
RESULT: ${result}
OUTCOME: ${success ? 'succeeded' : 'failed'}

Think about:
- What approach was used?
- What made it work (or fail)?
- When would this lesson apply again?

Return a JSON object with these exact fields:
{
  "intent": "A brief description of what this lesson is about",
  "lesson": "The key insight to remember",
  "patterns": ["trigger", "words", "that", "should", "activate", "this", "memory"]
}

Return ONLY the JSON object, no other text.`;
}
