import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { RunnableSequence } from '@langchain/core/runnables';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { formatResponseAsPoints } from '../utils/formatResponse.js';

export type SummaryFormat = 'text' | 'points';

export const SUMMARY_FORMATS: readonly SummaryFormat[] = ['text', 'points'];

export const isSummaryFormat = (value: unknown): value is SummaryFormat =>
    SUMMARY_FORMATS.some(format => format === value);

const summaryPrompt = ChatPromptTemplate.fromTemplate('Summarize this YouTube video:\n\n{transcript}');

export async function summarizeTranscript(
    llm: BaseChatModel,
    transcript: string,
    { format = 'text' }: { format?: SummaryFormat } = {},
): Promise<string> {
    const chain = RunnableSequence.from([summaryPrompt, llm, new StringOutputParser()]);
    const summary = await chain.invoke({ transcript });
    return format === 'points' ? formatResponseAsPoints(summary) : summary.trim();
}
