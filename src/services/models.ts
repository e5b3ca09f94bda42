import { GoogleGenerativeAIEmbeddings, ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { TaskType } from '@google/generative-ai';
import type { AppConfig } from '../config.js';

export function createEmbeddings(config: AppConfig) {
    return new GoogleGenerativeAIEmbeddings({
        apiKey: config.googleApiKey,
        model: config.embeddingModel,
        taskType: TaskType.RETRIEVAL_DOCUMENT,
    });
}

export function createChatModel(config: AppConfig) {
    return new ChatGoogleGenerativeAI({
        model: config.chatModel,
        apiKey: config.googleApiKey,
        temperature: config.temperature,
    });
}
