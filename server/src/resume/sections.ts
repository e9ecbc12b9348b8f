/**
 * Fixed resume sections, in layout order. The request schema, payload
 * validation and the 4x2 page grid are all derived from this list.
 */
export const SECTION_IDS = [
  'career_overview',
  'summary_profile',
  'core_technical_competencies',
  'work_experience',
  'academic_history',
  'contact_information',
  'professional_development',
  'technical_skills_matrix',
] as const;

export type SectionId = typeof SECTION_IDS[number];

export const BULLETS_PER_SECTION = 3;

/** `work_experience` → `WORK EXPERIENCE` */
export function sectionHeading(id: SectionId): string {
  return id.replace(/_/g, ' ').toUpperCase();
}

/**
 * Build a record keyed by every section. The literal below must list exactly
 * the members of SECTION_IDS, so adding a section fails to compile until it is
 * mapped here too.
 */
export function mapSections<T>(fn: (id: SectionId) => T): Record<SectionId, T> {
  return {
    career_overview: fn('career_overview'),
    summary_profile: fn('summary_profile'),
    core_technical_competencies: fn('core_technical_competencies'),
    work_experience: fn('work_experience'),
    academic_history: fn('academic_history'),
    contact_information: fn('contact_information'),
    professional_development: fn('professional_development'),
    technical_skills_matrix: fn('technical_skills_matrix'),
  };
}
