import "dotenv/config";
import { askQuestions, saveQaLog } from "./agent.service";

const DEFAULT_QUESTIONS = [
  { question: "What are the titles of all the papers in the database?", questionType: "basic" },
  {
    question: "What are the names of each of the collections, and how many documents are in each?",
    questionType: "metadata",
  },
  {
    question: "Pick one paper and summarize the results reported in its tables.",
    questionType: "table_extraction",
  },
];

async function main() {
  const argv = process.argv.slice(2);
  const questions =
    argv.length > 0
      ? argv.map((question) => ({ question, questionType: "cli" }))
      : DEFAULT_QUESTIONS;

  const entries = await askQuestions(questions);
  saveQaLog(entries);
  console.log(`Session completed. ${entries.length} questions processed.`);
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Agent run failed:", error);
    process.exit(1);
  });
}
