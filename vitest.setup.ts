import "reflect-metadata";

if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = "silent";
}
