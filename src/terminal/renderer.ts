/**
 * Terminal image preview
 *
 * Renderers hand the selector a shell command that draws one image inside
 * the preview pane. Shorts are cropped to 9:16 before rendering so the
 * letterboxing of their thumbnails is cut away.
 */

export type PreviewPlaceholders = {
	/** Placeholder the selector replaces with the image path */
	path: string
	/** Placeholder the selector replaces with the entry form */
	form: string
}

export interface ImageRenderer {
	previewCommand(placeholders: PreviewPlaceholders): string
	requiredExecutables(): string[]
}

export class ChafaRenderer implements ImageRenderer {
	constructor(private readonly options: { cropShorts?: boolean } = {}) {}

	previewCommand({ path, form }: PreviewPlaceholders): string {
		const chafa = 'chafa --view-size "${FZF_PREVIEW_COLUMNS}x${FZF_PREVIEW_LINES}" --align center,center'
		if (!this.options.cropShorts) {
			return `${chafa} ${path}`
		}
		return [
			`if [ ${form} = short ]`,
			`then convert ${path} -gravity center -crop 9:16 +repage - | ${chafa} -`,
			`else ${chafa} ${path}`,
			'fi',
		].join('; ')
	}

	requiredExecutables(): string[] {
		return this.options.cropShorts ? ['chafa', 'convert'] : ['chafa']
	}
}
