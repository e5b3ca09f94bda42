import { assertModelCredentials, loadConfig, loadEnvFile } from './config.js';
import { createApp } from './app.js';
import { ChatService } from './services/chat.js';
import { createChatModel, createEmbeddings } from './services/models.js';
import { SessionStore } from './services/sessions.js';
import { createTranscriptService } from './services/transcript.js';

loadEnvFile();

const config = loadConfig();
assertModelCredentials(config);

const transcripts = createTranscriptService(config);
const llm = createChatModel(config);
const chat = new ChatService({
    transcripts,
    embeddings: createEmbeddings(config),
    llm,
    sessions: new SessionStore(config.maxSessions),
    options: {
        chunkSize: config.chunkSize,
        chunkOverlap: config.chunkOverlap,
        retrievalK: config.retrievalK,
        maxHistoryTurns: config.maxHistoryTurns,
    },
});

const app = createApp({ config, transcripts, chat, llm });

app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`Transcript providers: ${transcripts.providerNames.join(' -> ') || '(none)'}`);
});
