import fs from 'fs';
import path from 'path';

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp'];

export interface ImageCategory {
    name: string;
    /** Catalog-relative image references, e.g. "nature/lake.jpg" */
    images: string[];
}

/**
 * Read-only view of the preset image directory.
 * Every sub-directory is a category; empty categories are left out.
 */
export class ImageCatalog {
    private readonly rootDir: string;
    private categoryList: ImageCategory[] = [];
    private known: Set<string> = new Set();

    constructor(rootDir: string) {
        this.rootDir = path.resolve(rootDir);
        this.refresh();
    }

    /**
     * Re-scans the image directory.
     */
    refresh(): void {
        this.categoryList = this.scan();
        this.known = new Set(this.categoryList.flatMap((category) => category.images));
        console.log(`[ImageCatalog] Categories: ${this.categoryList.map((c) => c.name).join(', ') || '(none)'}`);
    }

    categories(): ImageCategory[] {
        return this.categoryList.map((category) => ({ name: category.name, images: [...category.images] }));
    }

    has(imageRef: string): boolean {
        return this.known.has(imageRef);
    }

    /**
     * Absolute path of a catalog image.
     */
    resolvePath(imageRef: string): string {
        if (!this.has(imageRef)) {
            throw new Error(`Image not in catalog: ${imageRef}`);
        }
        return path.join(this.rootDir, ...imageRef.split('/'));
    }

    get root(): string {
        return this.rootDir;
    }

    private scan(): ImageCategory[] {
        if (!fs.existsSync(this.rootDir)) {
            console.error(`[ImageCatalog] Image directory does not exist: ${this.rootDir}`);
            return [];
        }

        const categories: ImageCategory[] = [];
        const entries = fs.readdirSync(this.rootDir, { withFileTypes: true })
            .filter((entry) => entry.isDirectory())
            .map((entry) => entry.name)
            .sort();

        for (const name of entries) {
            const images = fs.readdirSync(path.join(this.rootDir, name), { withFileTypes: true })
                .filter((entry) => entry.isFile() && IMAGE_EXTENSIONS.includes(path.extname(entry.name).toLowerCase()))
                .map((entry) => `${name}/${entry.name}`)
                .sort();

            if (images.length > 0) {
                categories.push({ name, images });
            }
        }

        return categories;
    }
}
