import { createBooksClient, formatBooksError, PrintType, VolumeQuery } from "../mod.ts";

const client = createBooksClient({ apiKey: process.env.GOOGLE_BOOKS_API_KEY });

const query = VolumeQuery.byTitle("la femme de menage")
  .map((q) => q.withLanguageRestrict("fr").withPrintType(PrintType.Books).withMaxResults(5));

if (query.isErr()) {
  console.error(formatBooksError(query.error));
  process.exit(1);
}

const result = await client.search(query.value);

result.match(
  (response) => {
    console.log(`${response.totalItems} volumes`);
    for (const volume of response.items ?? []) {
      const authors = volume.volumeInfo.authors?.join(", ") ?? "unknown author";
      console.log(`- ${volume.volumeInfo.title} (${authors}) [${volume.id}]`);
    }
  },
  (error) => {
    console.error(formatBooksError(error));
    process.exitCode = 1;
  },
);
