/**
 * In-page article extraction
 *
 * extractArticleData runs inside the browser through page.evaluate, so it
 * must not reference anything outside its own body.
 */

export interface RawImage {
  src: string;
  alt: string;
  caption: string;
}

export interface RawSection {
  heading: string | null;
  headingLevel: number;
  content: string;
  images: RawImage[];
}

export interface RawArticleData {
  title: string;
  subtitle: string;
  date: string;
  author: string;
  heroImage: RawImage | null;
  sections: RawSection[];
  relatedArticles: Array<{ title: string; url: string }>;
}

export function extractArticleData(): RawArticleData {
  const text = (el: Element | null | undefined): string => el?.textContent?.trim() ?? '';

  const imageOf = (img: HTMLImageElement, withCaption: boolean): RawImage => ({
    src: img.src,
    alt: img.alt || '',
    caption: withCaption ? text(img.closest('figure')?.querySelector('figcaption')) : '',
  });

  const data: RawArticleData = {
    title: '',
    subtitle: '',
    date: '',
    author: '',
    heroImage: null,
    sections: [],
    relatedArticles: [],
  };

  data.title =
    text(document.querySelector('.hemi-3pd-article-intro__title')) ||
    text(document.querySelector('h1'));
  data.subtitle = text(document.querySelector('.heroBasic-subtitle-section'));
  data.date = text(document.querySelector('.hemi-article-date'));
  data.author = text(document.querySelector('.hemi-article-author-name'));

  const heroImg =
    document.querySelector<HTMLImageElement>('.hemi-3pd-article-intro img') ??
    document.querySelector<HTMLImageElement>('[class*="hero"] img');
  if (heroImg?.src) {
    data.heroImage = imageOf(heroImg, true);
  }

  const sections: RawSection[] = [];

  const intro = text(document.querySelector('.hemi-3pd-article-intro__paragraph'));
  if (intro) {
    sections.push({ heading: null, headingLevel: 2, content: intro, images: [] });
  }

  document.querySelectorAll('.hemi-article-section').forEach((sectionEl) => {
    const heading = text(sectionEl.querySelector('.hemi-article-section-title')) || null;
    const section: RawSection = { heading, headingLevel: 2, content: '', images: [] };

    sectionEl.querySelectorAll('p').forEach((p) => {
      const paragraph = text(p);
      if (paragraph && paragraph !== heading) {
        section.content += `${paragraph}\n\n`;
      }
    });

    sectionEl.querySelectorAll('img').forEach((img) => {
      if (img.src) {
        section.images.push(imageOf(img, true));
      }
    });

    if (section.content || section.images.length > 0) {
      sections.push(section);
    }
  });

  // Generic fallback: headings and the paragraphs that follow them
  const onlyIntro = sections.length === 1 && sections[0]?.heading === null;
  if (sections.length === 0 || onlyIntro) {
    document.querySelectorAll('h2, h3').forEach((headingEl) => {
      const heading = text(headingEl);
      if (!heading || heading.length <= 10 || heading.includes('Menu') || heading.includes('Search')) {
        return;
      }

      const section: RawSection = {
        heading,
        headingLevel: headingEl.tagName === 'H3' ? 3 : 2,
        content: '',
        images: [],
      };

      let next = headingEl.parentElement?.nextElementSibling ?? headingEl.nextElementSibling;
      for (let safety = 0; next && safety < 50; safety++) {
        if (next.tagName === 'P') {
          section.content += `${text(next)}\n\n`;
        }
        next.querySelectorAll('img').forEach((img) => {
          if (img.src) {
            section.images.push(imageOf(img, false));
          }
        });
        next = next.nextElementSibling;
      }

      if (section.content) {
        sections.push(section);
      }
    });
  }

  data.sections = sections;

  const related = document.querySelector('[class*="DynamicRecommendation"]');
  related?.querySelectorAll('a').forEach((link) => {
    const title = text(link);
    if (title.length > 5 && link.href) {
      data.relatedArticles.push({ title, url: link.href });
    }
  });

  return data;
}
