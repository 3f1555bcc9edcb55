#!/usr/bin/env node
import 'dotenv/config';

import { TextGenerationComponent } from './component/textGenerationComponent';
import { isErrorMessage } from './component/message';
import { resolveConfig } from './utils/config';

const USAGE = 'Usage: text-generation "<prompt>" [stop sequence ...]';

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [prompt, ...stop] = argv;
  if (!prompt) {
    console.error(USAGE);
    return 1;
  }

  const config = resolveConfig();
  const component = new TextGenerationComponent({ responseMaskKeys: config.responseMaskKeys });

  const message = await component.run({
    apiUrl: config.apiUrl,
    apiKey: config.apiKey,
    prompt,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    stop,
  });

  console.log(message.text);
  return isErrorMessage(message) ? 1 : 0;
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('[text-generation] Unexpected failure', { error: err });
      process.exitCode = 1;
    });
}
