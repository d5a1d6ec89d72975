import { createOutlineSection, type OutlineSection } from "./types.js";

const appendDescription = (section: OutlineSection, line: string): void => {
  section.description = section.description ? `${section.description} ${line}` : line;
};

/**
 * Reads a markdown outline: `## ` opens a section, `### ` a subsection of the
 * current section, any other line extends the current description. Lines
 * before the first section are ignored.
 */
export const parseOutlineMarkdown = (content: string): OutlineSection[] => {
  const sections: OutlineSection[] = [];
  let currentSection: OutlineSection | null = null;
  let currentSubsection: OutlineSection | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    if (line.startsWith("## ")) {
      currentSection = createOutlineSection({ title: line.slice(3).trim() });
      currentSubsection = null;
      sections.push(currentSection);
    } else if (line.startsWith("### ")) {
      if (currentSection) {
        currentSubsection = createOutlineSection({ title: line.slice(4).trim() });
        currentSection.subsections.push(currentSubsection);
      }
    } else if (currentSubsection) {
      appendDescription(currentSubsection, line);
    } else if (currentSection) {
      appendDescription(currentSection, line);
    }
  }

  return sections;
};
