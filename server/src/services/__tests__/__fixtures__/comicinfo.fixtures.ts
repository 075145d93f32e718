/**
 * ComicInfo.xml Fixtures
 *
 * Sample XML content and in-memory CBZ archives for testing metadata reads.
 */

import JSZip from 'jszip';
import type { ComicInfo } from '../../comicinfo.service.js';

/**
 * ComicInfo.xml with every field the scanner reads, plus fields it ignores.
 */
export const COMPLETE_COMICINFO_XML = `<?xml version="1.0" encoding="UTF-8"?>
<ComicInfo>
  <Title>Kuroyukihime's Return</Title>
  <Series>Accel World</Series>
  <Number type="main">5</Number>
  <Volume>2</Volume>
  <TitleSort>Accel World 02</TitleSort>
  <SeriesSort>Accel World</SeriesSort>
  <LocalizedSeries>World of Acceleration</LocalizedSeries>
  <Format>Light Novel</Format>
  <Summary>Haruyuki returns to the Accelerated World.</Summary>
  <Year>2010</Year>
</ComicInfo>`;

export const EXPECTED_COMPLETE_COMICINFO: ComicInfo = {
  Series: 'Accel World',
  Number: '5',
  Volume: '2',
  TitleSort: 'Accel World 02',
  SeriesSort: 'Accel World',
  LocalizedSeries: 'World of Acceleration',
  Format: 'Light Novel',
};

/**
 * Minimal ComicInfo.xml with only a series and an empty volume.
 */
export const MINIMAL_COMICINFO_XML = `<?xml version="1.0"?>
<ComicInfo><Series>Batman</Series><Volume></Volume></ComicInfo>`;

/**
 * A special release.
 */
export const SPECIAL_COMICINFO_XML = `<?xml version="1.0"?>
<ComicInfo><Series>Batman</Series><Number>1</Number><Format>Annual</Format></ComicInfo>`;

export const MALFORMED_COMICINFO_XML = '<ComicInfo><Series>Broken</ComicInfo>';

export const NO_ROOT_COMICINFO_XML = '<?xml version="1.0"?><Metadata><Series>Batman</Series></Metadata>';

/**
 * Build a CBZ holding one page and, when given, a ComicInfo.xml at `comicInfoPath`.
 */
export async function createCbz(comicInfoXml?: string, comicInfoPath = 'ComicInfo.xml'): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('001.jpg', 'page');
  if (comicInfoXml !== undefined) {
    zip.file(comicInfoPath, comicInfoXml);
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}
