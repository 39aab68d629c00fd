import { Shot } from '../entities/Shot';
import { StyleTemplate } from '../entities/StyleTemplate';

/** Per-shot text limit of multi-shot video models. */
export const MAX_SHOT_TEXT_LENGTH = 512;

const CAMERA_MOVES = [
    'slow aerial rise revealing',
    'sweeping tracking shot across',
    'gentle pan over',
    'slow push-in toward',
    'orbiting drone shot around',
    'low gliding shot through',
] as const;

/**
 * Builds one shot description per image so consecutive shots read as a single story.
 * Deterministic: the same images, style and category always give the same plan.
 */
export class ShotPlanner {
    plan(images: string[], style: StyleTemplate, category?: string): Shot[] {
        const subject = category ? `the ${category.replace(/[-_]+/g, ' ')} scene` : 'the scene';
        const styleText = style.fragments.join(', ');

        return images.map((image, index) => {
            const move = CAMERA_MOVES[index % CAMERA_MOVES.length];
            const text = `${capitalize(move)} ${subject}, ${this.describePosition(index, images.length)}, ${styleText}`;
            return {
                imageIndex: index,
                image,
                text: text.substring(0, MAX_SHOT_TEXT_LENGTH),
            };
        });
    }

    private describePosition(index: number, total: number): string {
        if (total === 1) {
            return 'single continuous shot';
        }
        if (index === 0) {
            return 'opening shot';
        }
        if (index === total - 1) {
            return 'closing shot with a smooth settle';
        }
        return `shot ${index + 1} of ${total} flowing on from the previous shot`;
    }
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}
