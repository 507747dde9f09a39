export { handler as alerts } from "./api/alerts";
export { sync as syncRunbooks } from "./api/runbooks";
export { handler as health } from "./api/health";
