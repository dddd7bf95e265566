import { loadResolverConfig } from "./config";
import { getKnowledgeBase } from "./knowledge_base";
import { createResolver } from "./resolver";
import { buildToolRegistry, createServerApp, SERVER_INFO } from "./server";

const knowledgeBase = getKnowledgeBase();
const resolver = createResolver({ config: loadResolverConfig(), knowledgeBase });
const tools = buildToolRegistry(resolver, knowledgeBase);
const app = createServerApp(tools, resolver.backend);

const port = Number(process.env.PORT) || 3000;
app.listen(port, () => {
  console.log(
    `${SERVER_INFO.name} listening on :${port} (pathway backend: ${resolver.backend}, shots: ${resolver.config.shots})`
  );
});
