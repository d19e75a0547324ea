import type { SyllabusForm } from "../types.js";

export const SYLLABUS_OPTIONS = {
  classTypes: ["upskill", "language"],
  classFormats: ["offline", "online"],
  upskillScopes: [
    "Business & Management",
    "Media & Creative",
    "Tourism & Hospitality",
    "Language",
    "Engineering",
    "Technology",
    "Career & Development",
    "Agriculture",
    "Green & Sustainability",
    "Education"
  ],
  languages: ["English", "Mandarin", "Japanese", "Korean", "Bahasa Indonesia"]
} as const;

const SYLLABUS_INSTRUCTIONS = [
  "Provide a clear introduction to the course, outlining its objectives, learning outcomes, and the skills students will acquire.",
  "Divide the course into logical sections or modules. Each module should cover specific topics in detail and include subtopics as needed. Ensure the order of topics is coherent and follows a natural progression of learning.",
  "Specify the types of assessments (e.g., quizzes, assignments, projects) and how they align with learning outcomes. Include a grading rubric or percentage breakdown.",
  "Provide a list of textbooks, articles, or other materials that students need to review. Include both mandatory and supplementary readings.",
  "Highlight any practical activities, labs, or case studies included in the syllabus to deepen understanding of the subject."
];

// Form values are interpolated as-is; nothing here escapes user text.
export function buildSyllabusPrompt(form: SyllabusForm): string {
  const scopeKind = form.classType === "language" ? "language" : "upskill";
  return [
    "Write a comprehensive syllabus on the following premise:",
    "",
    `company_name: ${form.companyName}`,
    `company_industry: ${form.companyIndustry}`,
    `job_title: ${form.jobTitle}`,
    `job_level: ${form.jobLevel}`,
    `class_format: ${form.classFormat}`,
    `learning_objective: ${form.learningObjective}`,
    `If the class_type: ${form.classType} then create ${scopeKind} recommendation syllabus based on ${form.scopes.join(", ")} type`,
    "",
    ...SYLLABUS_INSTRUCTIONS
  ].join("\n");
}
