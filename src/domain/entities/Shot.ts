/**
 * One shot of a multi-shot video: a source image and what the camera should do with it.
 */
export interface Shot {
    /** Position of the source image in the job's image list */
    imageIndex: number;
    /** Image reference the shot starts from */
    image: string;
    /** Shot description sent to the video model */
    text: string;
}
