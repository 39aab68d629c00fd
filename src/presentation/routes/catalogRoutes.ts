import { Router, Request, Response } from 'express';
import { ImageCatalog } from '../../application/ImageCatalog';
import { StyleResolver } from '../../application/StyleResolver';

/**
 * Read-only lists the page builds its pickers from.
 */
export function createCatalogRoutes(styleResolver: StyleResolver, catalog: ImageCatalog): Router {
    const router = Router();

    router.get('/styles', (_req: Request, res: Response) => {
        res.json({
            styles: styleResolver.list().map((template) => ({
                name: template.name,
                label: template.label,
            })),
        });
    });

    // Image URLs are served by the static /images mount
    router.get('/images', (_req: Request, res: Response) => {
        res.json({
            categories: catalog.categories().map((category) => ({
                name: category.name,
                images: category.images.map((image) => ({
                    path: image,
                    url: `/images/${image.split('/').map(encodeURIComponent).join('/')}`,
                })),
            })),
        });
    });

    return router;
}
