import {parseEnv} from './env';
import {createApp} from './index';

const env = parseEnv(process.env);
const app = createApp(env);

app.listen(env.PORT, () => {
  console.log(`Amount detector listening on port ${env.PORT}`, {
    classifier: env.OPENAI_API_KEY !== undefined ? env.OPENAI_MODEL : 'keyword rules',
    ocrLang: env.OCR_LANG,
  });
});
