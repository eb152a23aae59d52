export function encodeJson(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}

export function encodeText(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export const sampleVolume = {
  kind: "books#volume",
  id: "vol-001",
  etag: "etag-001",
  selfLink: "https://www.googleapis.com/books/v1/volumes/vol-001",
  volumeInfo: {
    title: "Test Book",
    subtitle: "A Subtitle",
    authors: ["A. Writer", "B. Editor"],
    publisher: "Test Press",
    publishedDate: "2019-04-02",
    industryIdentifiers: [
      { type: "ISBN_13", identifier: "9780000000001" },
      { type: "ISBN_10", identifier: "0000000001" },
    ],
    pageCount: 312,
    printType: "BOOK",
    categories: ["Fiction"],
    imageLinks: {
      smallThumbnail: "http://books.example.com/small.jpg",
      thumbnail: "http://books.example.com/thumb.jpg",
    },
  },
};

export const sampleVolumeResponse = {
  kind: "books#volumes",
  totalItems: 1,
  items: [sampleVolume],
};
