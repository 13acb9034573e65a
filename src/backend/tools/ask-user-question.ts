import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { type ToolReturnValue, toolError, toolOk } from '../llm/tooling';
import { type ToolCallScope, ZodTool } from '../soul/toolset';
import { QuestionNotSupported, QuestionRequest } from '../wire/types';

const QuestionOptionSchema = z.object({
  label: z.string().min(1),
  description: z.string().default(''),
});

const QuestionSchema = z.object({
  question: z.string().min(1),
  header: z.string().default(''),
  options: z.array(QuestionOptionSchema).min(2).max(4),
  multi_select: z.boolean().default(false),
});

const AskUserQuestionParamsSchema = z.object({
  questions: z.array(QuestionSchema).min(1).max(4),
});

export const QUESTION_NOT_SUPPORTED_MESSAGE =
  'The connected client cannot show interactive questions. Do NOT call AskUserQuestion again ' +
  'in this session. Ask the user in your text response instead.';

export const QUESTION_DISMISSED_NOTE = 'User dismissed the question without answering.';

/** Ask the user multiple-choice questions through the client and return the answers. */
export class AskUserQuestionTool extends ZodTool<typeof AskUserQuestionParamsSchema> {
  readonly name = 'AskUserQuestion';
  readonly description =
    'Ask the user one to four multiple-choice questions when you need a decision or a ' +
    'preference to continue. Each question has two to four options; the user may also ' +
    'answer in their own words. Answers come back keyed by question text.';
  readonly parameters = {
    type: 'object',
    properties: {
      questions: {
        type: 'array',
        minItems: 1,
        maxItems: 4,
        items: {
          type: 'object',
          properties: {
            question: { type: 'string', description: 'The full question.' },
            header: { type: 'string', description: 'A short label of at most 12 characters.' },
            options: {
              type: 'array',
              minItems: 2,
              maxItems: 4,
              items: {
                type: 'object',
                properties: {
                  label: { type: 'string' },
                  description: { type: 'string' },
                },
                required: ['label'],
              },
            },
            multi_select: {
              type: 'boolean',
              description: 'Allow more than one option to be chosen.',
            },
          },
          required: ['question', 'options'],
        },
      },
    },
    required: ['questions'],
  };
  protected readonly schema = AskUserQuestionParamsSchema;

  protected async execute(
    params: z.output<typeof AskUserQuestionParamsSchema>,
    scope: ToolCallScope
  ): Promise<ToolReturnValue> {
    if (!scope.wire) {
      return toolError({ message: QUESTION_NOT_SUPPORTED_MESSAGE, brief: 'No client connected' });
    }

    const request = new QuestionRequest({
      id: randomUUID(),
      tool_call_id: scope.toolCall.id,
      questions: params.questions,
    });
    scope.wire.send(request);

    let answers: Record<string, string>;
    try {
      answers = await request.wait();
    } catch (error) {
      if (error instanceof QuestionNotSupported) {
        return toolError({ message: QUESTION_NOT_SUPPORTED_MESSAGE, brief: 'Client unsupported' });
      }
      throw error;
    }

    if (Object.keys(answers).length === 0) {
      return toolOk({
        output: JSON.stringify({ answers: {}, note: QUESTION_DISMISSED_NOTE }),
        brief: 'Question dismissed',
      });
    }
    return toolOk({ output: JSON.stringify({ answers }), brief: 'User answered' });
  }
}
