import type { BinaryObjectStore } from "@/modules/storage/objectStore";

/** In-process stand-in; URLs are deterministic and never expire. */
export class FakeObjectStore implements BinaryObjectStore {
  public readonly objects = new Map<
    string,
    { bytes: Buffer; contentType: string }
  >();

  public async put(
    bytes: Buffer,
    contentType: string,
    name: string,
  ): Promise<string> {
    this.objects.set(name, { bytes, contentType });
    return name;
  }

  public async getTemporaryUrl(name: string): Promise<string | null> {
    return this.objects.has(name) ? `https://objects.test/${name}?sig=fake` : null;
  }
}
