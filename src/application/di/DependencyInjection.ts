import type { VolumeUseCase } from "../ports/in/VolumeUseCase.ts";
import type { HttpTransport } from "../ports/out/HttpTransport.ts";
import { BooksClient } from "../services/BooksClient.ts";
import type { BooksClientConfig } from "../services/BooksClient.ts";

/**
 * Dependency Injection container for the client
 * Manages the creation and wiring of application components
 */
export class DependencyInjection {
  private transport?: HttpTransport;
  private config: BooksClientConfig = {};
  private booksClient?: BooksClient;

  registerTransport(transport: HttpTransport): this {
    this.transport = transport;
    this.booksClient = undefined;
    return this;
  }

  registerConfig(config: BooksClientConfig): this {
    this.config = { ...config };
    this.booksClient = undefined;
    return this;
  }

  getVolumeUseCase(): VolumeUseCase {
    if (!this.booksClient) {
      if (!this.transport) {
        throw new Error("HttpTransport not registered");
      }

      this.booksClient = new BooksClient(this.transport, this.config);
    }

    return this.booksClient;
  }
}
