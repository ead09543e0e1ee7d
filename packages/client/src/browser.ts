import { startAsyncMedia } from "./index.ts";

startAsyncMedia(document);
